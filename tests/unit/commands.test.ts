import fs from 'fs';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { runRender } from '../../src/commands/render.js';
import { runSummarize } from '../../src/commands/summarize.js';
import { ConfigError, OutputWriteError } from '../../src/errors.js';
import { parseTree, writeTreeJson } from '../../src/output.js';
import { flattenTree } from '../../src/tree/builder.js';
import { renderTreeText } from '../../src/tree/renderer.js';
import type { SummaryTree } from '../../src/types.js';
import { FakeSummaryClient, instantSleep, makeTempDir, removeDir, writeFiles } from '../helpers/fixtures.js';

describe('runSummarize', () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir();
    writeFiles(root, {
      'a.py': 'print("a")',
      'sub/b.py': 'b = 1',
      'config.yaml': 'api_key: "test-key"\nmax_retries: 2\n',
      '.gitignore': 'build/\n',
      'build/out.js': 'compiled',
    });
  });

  afterEach(() => {
    removeDir(root);
  });

  it('summarizes the repository and saves the nested tree as JSON', async () => {
    const client = new FakeSummaryClient('Does things.\nWell.');
    const output = path.join(root, 'summary.json');

    const result = await runSummarize({
      root,
      configPath: path.join(root, 'config.yaml'),
      output,
      env: {},
      client,
      sleep: instantSleep,
    });

    const saved = parseTree(fs.readFileSync(output, 'utf8'));
    expect(Object.fromEntries(flattenTree(saved, '/'))).toEqual({
      'a.py': 'Does things.\nWell.',
      'sub/b.py': 'Does things.\nWell.',
    });
    expect(result.outputPath).toBe(output);
    expect(result.summaries.size).toBe(2);
    expect(client.requests).toHaveLength(2);
  });

  it('never sends the config file to the API', async () => {
    const client = new FakeSummaryClient('Summary.');

    const result = await runSummarize({
      root,
      configPath: path.join(root, 'config.yaml'),
      output: path.join(root, 'summary.json'),
      env: {},
      client,
    });

    expect([...result.summaries.keys()]).not.toContain('config.yaml');
    expect(client.requests.some(request => request.user.includes('test-key'))).toBe(false);
  });

  it('uses the configured retry limit', async () => {
    const client = new FakeSummaryClient(new Error('service unavailable'));

    const result = await runSummarize({
      root,
      configPath: path.join(root, 'config.yaml'),
      output: path.join(root, 'summary.json'),
      env: {},
      client,
      sleep: instantSleep,
    });

    expect(result.summaries.size).toBe(0);
    expect(result.skipped.map(file => file.reason)).toEqual(['summary-failed', 'summary-failed']);
    expect(client.requests).toHaveLength(4);
  });

  it('fails with ConfigError before reading any file when no API key is set', async () => {
    fs.rmSync(path.join(root, 'config.yaml'));
    const client = new FakeSummaryClient('Summary.');
    const output = path.join(root, 'summary.json');

    await expect(runSummarize({ root, configPath: path.join(root, 'config.yaml'), output, env: {}, client }))
      .rejects.toBeInstanceOf(ConfigError);
    expect(client.requests).toHaveLength(0);
    expect(fs.existsSync(output)).toBe(false);
  });

  it('reports an unwritable output as OutputWriteError', async () => {
    await expect(runSummarize({
      root,
      configPath: path.join(root, 'config.yaml'),
      output: path.join(root, 'missing-dir', 'summary.json'),
      env: {},
      client: new FakeSummaryClient('Summary.'),
    })).rejects.toBeInstanceOf(OutputWriteError);
  });
});

describe('runRender', () => {
  let dir: string;
  const tree: SummaryTree = new Map<string, string | SummaryTree>([
    ['a.py', 'desc A'],
    ['sub', new Map([['b.py', 'desc B\nmore']])],
  ]);

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('writes the rendered tree to a file and prints the same text', () => {
    const input = path.join(dir, 'tree.json');
    const output = path.join(dir, 'tree.txt');
    const printed: string[] = [];
    writeTreeJson(input, tree);

    runRender({ input, output, print: true, write: text => printed.push(text) });

    const expected =
      'Code Summary Tree\n' +
      '=================\n' +
      '\n' +
      '├── a.py    desc A\n' +
      '└── sub/\n' +
      '    └── b.py    desc B | more\n';
    expect(fs.readFileSync(output, 'utf8')).toBe(expected);
    expect(printed).toEqual([expected]);
    expect(renderTreeText(tree)).toBe(expected);
  });

  it('only prints when no output file is given', () => {
    const input = path.join(dir, 'tree.json');
    const printed: string[] = [];
    writeTreeJson(input, tree);

    const rendered = runRender({ input, print: true, write: text => printed.push(text) });

    expect(rendered).toEqual(tree);
    expect(printed).toHaveLength(1);
    expect(fs.readdirSync(dir)).toEqual(['tree.json']);
  });

  it('renders integer-like names where the summary run placed them', async () => {
    writeFiles(dir, {
      'b.py': 'b = 1',
      '2024/notes.md': '# Notes',
      'config.yaml': 'api_key: "test-key"\n',
    });
    const input = path.join(dir, 'tree.json');
    await runSummarize({
      root: dir,
      configPath: path.join(dir, 'config.yaml'),
      output: input,
      env: {},
      client: new FakeSummaryClient('Summary.'),
    });
    const printed: string[] = [];

    runRender({ input, print: true, write: text => printed.push(text) });

    expect(printed).toEqual([
      'Code Summary Tree\n' +
        '=================\n' +
        '\n' +
        '├── b.py    Summary.\n' +
        '└── 2024/\n' +
        '    └── notes.md    Summary.\n',
    ]);
  });

  it('renders nothing when there is no data', () => {
    const output = path.join(dir, 'tree.txt');

    expect(runRender({ input: path.join(dir, 'missing.json'), output })).toBeNull();
    expect(fs.existsSync(output)).toBe(false);
  });
});
