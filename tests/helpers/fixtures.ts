import fs from 'fs';
import os from 'os';
import path from 'path';
import type { SummaryClient, SummaryRequest } from '../../src/summarizer/client.js';

export function makeTempDir(prefix = 'summary-tree-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * Creates files under `root`; string values are written as UTF-8, buffers as-is.
 */
export function writeFiles(root: string, files: Record<string, string | Buffer>): void {
  for (const [relativePath, content] of Object.entries(files)) {
    const fullPath = path.join(root, ...relativePath.split('/'));
    fs.mkdirSync(path.dirname(fullPath), { recursive: true });
    fs.writeFileSync(fullPath, content);
  }
}

/**
 * SummaryClient that replays queued responses; an Error in the queue is thrown.
 * Once the queue is empty the fallback is used for every call.
 */
export class FakeSummaryClient implements SummaryClient {
  readonly requests: SummaryRequest[] = [];

  constructor(
    private readonly fallback: string | Error,
    private readonly queue: Array<string | Error> = []
  ) {}

  async complete(request: SummaryRequest): Promise<string> {
    this.requests.push(request);
    const next = this.queue.length > 0 ? this.queue.shift() : this.fallback;
    if (next instanceof Error) throw next;
    return next ?? '';
  }
}

export const instantSleep = async (_ms: number): Promise<void> => {};
