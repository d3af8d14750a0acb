import path from 'path';
import logger from '../logger.js';
import { DEFAULT_CONFIG_PATH, loadConfig } from '../config.js';
import { DEFAULT_IGNORE_FILE, IgnoreFilter } from '../ignore-filter.js';
import { DEFAULT_JSON_OUTPUT, writeTreeJson } from '../output.js';
import { retryPolicyFromConfig } from '../retry.js';
import { OpenAISummaryClient, type SummaryClient } from '../summarizer/client.js';
import { summarizeRepo } from '../summarizer/processor.js';
import { FileSummarizer } from '../summarizer/summarizer.js';
import { buildTree } from '../tree/builder.js';
import type { SummarizeRunResult, SummaryTree } from '../types.js';

export interface SummarizeCommandOptions {
    root: string;
    configPath?: string;
    output?: string;
    ignoreFile?: string;
    env?: NodeJS.ProcessEnv;
    /** Overrides the OpenAI client, e.g. with a stub. */
    client?: SummaryClient;
    sleep?: (ms: number) => Promise<void>;
}

export interface SummarizeCommandResult extends SummarizeRunResult {
    tree: SummaryTree;
    outputPath: string;
}

/**
 * Config check, traversal, per-file summaries, tree build, JSON output.
 * ConfigError is thrown before any file is touched.
 */
export async function runSummarize(options: SummarizeCommandOptions): Promise<SummarizeCommandResult> {
    const root = path.resolve(options.root);
    const configPath = path.resolve(options.configPath ?? DEFAULT_CONFIG_PATH);
    const outputPath = path.resolve(options.output ?? DEFAULT_JSON_OUTPUT);

    const config = loadConfig({ configPath, env: options.env });
    const client = options.client ?? new OpenAISummaryClient(config);
    const summarizer = new FileSummarizer(client, { ...retryPolicyFromConfig(config), sleep: options.sleep });

    // Never send the config (it holds the API key) or our own output to the API.
    const filter = IgnoreFilter.load(root, options.ignoreFile ?? DEFAULT_IGNORE_FILE, [
        configPath,
        `${configPath}.example`,
        outputPath,
    ]);

    logger.info({ root, model: config.model, rules: filter.rules.length }, 'Summarizing repository');
    const result = await summarizeRepo(root, summarizer, filter);

    const tree = buildTree(result.summaries);
    writeTreeJson(outputPath, tree);

    return { ...result, tree, outputPath };
}
