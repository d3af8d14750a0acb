#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import logger from './logger.js';
import { runRender } from './commands/render.js';
import { runSummarize } from './commands/summarize.js';
import { DEFAULT_CONFIG_PATH } from './config.js';
import { ConfigError } from './errors.js';
import { DEFAULT_IGNORE_FILE } from './ignore-filter.js';
import { DEFAULT_JSON_OUTPUT, DEFAULT_TEXT_OUTPUT } from './output.js';

interface SummarizeCliOptions {
  config: string;
  output: string;
  ignoreFile: string;
}

interface RenderCliOptions {
  output: string;
  file: boolean;
  print?: boolean;
}

function handleCommandError(error: unknown): void {
  if (error instanceof ConfigError) {
    logger.error(error.message);
    logger.info('You can:');
    error.remediation.forEach((step, index) => logger.info(`${index + 1}. ${step}`));
  } else {
    logger.error({ err: error }, 'Command failed');
  }
  process.exitCode = 1;
}

const program = new Command();

program
  .name('code-summary-tree')
  .description('Summarize the text files of a repository with an LLM and render the summaries as a tree');

program
  .command('summarize')
  .description('Walk a directory, summarize each text file and save the nested summaries as JSON')
  .argument('[dir]', 'Directory to process', '.')
  .option('-c, --config <file>', 'YAML config file (overrides environment variables)', DEFAULT_CONFIG_PATH)
  .option('-o, --output <file>', 'JSON file for the summary tree', DEFAULT_JSON_OUTPUT)
  .option('--ignore-file <name>', 'Ignore-rules file inside the directory', DEFAULT_IGNORE_FILE)
  .action(async (dir: string, options: SummarizeCliOptions) => {
    try {
      console.log(`Summarizing repository at ${dir}...`);
      const result = await runSummarize({
        root: dir,
        configPath: options.config,
        output: options.output,
        ignoreFile: options.ignoreFile,
      });
      console.log(`✅ ${result.summaries.size} summaries saved to ${result.outputPath} (${result.skipped.length} files skipped)`);
    } catch (error) {
      handleCommandError(error);
    }
  });

program
  .command('render')
  .description('Render a saved summary tree as indented text')
  .argument('[json]', 'Summary tree JSON file', DEFAULT_JSON_OUTPUT)
  .option('-o, --output <file>', 'Text file for the rendered tree', DEFAULT_TEXT_OUTPUT)
  .option('--no-file', 'Do not write the text file')
  .option('--print', 'Print the rendered tree to the console')
  .action((json: string, options: RenderCliOptions) => {
    try {
      runRender({
        input: json,
        output: options.file ? options.output : undefined,
        print: options.print,
      });
    } catch (error) {
      handleCommandError(error);
    }
  });

await program.parseAsync(process.argv);
