import fs from 'fs';
import path from 'path';
import logger from './logger.js';
import { IgnoreFilter } from './ignore-filter.js';

// Source code, markup and config formats. Anything else is treated as binary.
export const TEXT_EXTENSIONS: ReadonlySet<string> = new Set([
  '.py', '.js', '.ts', '.java', '.cpp', '.h', '.cs', '.go',
  '.rb', '.php', '.swift', '.kt', '.rs', '.md', '.txt', '.json',
  '.xml', '.yaml', '.yml', '.html', '.css', '.scss', '.less',
]);

export function isTextFile(filePath: string): boolean {
  return TEXT_EXTENSIONS.has(path.extname(filePath).toLowerCase());
}

/**
 * Walks `root` depth-first, yielding absolute paths of candidate text files.
 *
 * Each directory's files come before its subdirectories; siblings keep the
 * listing order. Ignored directories are pruned before descent and never listed.
 */
export function* walkRepo(root: string, filter: IgnoreFilter = new IgnoreFilter(root)): Generator<string> {
  const start = path.resolve(root);
  yield* walkDirectory(start, filter);
}

function* walkDirectory(dir: string, filter: IgnoreFilter): Generator<string> {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch (error) {
    logger.warn({ err: error, dir }, 'Cannot list directory, skipping');
    return;
  }

  const subdirs: string[] = [];

  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      if (!filter.shouldIgnore(fullPath)) subdirs.push(fullPath);
    } else if (entry.isFile() && !filter.shouldIgnore(fullPath) && isTextFile(fullPath)) {
      yield fullPath;
    }
  }

  for (const subdir of subdirs) {
    yield* walkDirectory(subdir, filter);
  }
}
