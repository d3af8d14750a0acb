import fs from 'fs';
import path from 'path';
import { minimatch } from 'minimatch';
import logger from './logger.js';

export const DEFAULT_IGNORE_FILE = '.gitignore';

/**
 * Parses ignore-file content: one glob per line, `#` comments and blank lines skipped.
 */
export function parseIgnoreRules(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0 && !line.startsWith('#'));
}

/**
 * Decides which paths under a root are excluded from traversal.
 *
 * A path is ignored when its root-relative form glob-matches any rule, or when a
 * rule ending in `/` is a string prefix of it. Rules are OR-ed; there is no negation.
 */
export class IgnoreFilter {
  readonly root: string;
  readonly rules: readonly string[];
  private readonly directoryPrefixes: string[];
  private readonly excluded: Set<string>;

  /**
   * @param excludedPaths exact paths skipped in addition to the rules
   */
  constructor(root: string, rules: readonly string[] = [], excludedPaths: readonly string[] = []) {
    this.root = path.resolve(root);
    this.rules = [...rules];
    this.directoryPrefixes = this.rules.filter(rule => rule.endsWith('/')).map(rule => rule.slice(0, -1));
    this.excluded = new Set(excludedPaths.map(excludedPath => this.relative(excludedPath)));
  }

  /**
   * Loads rules from `<root>/<fileName>`. A missing file gives an empty rule set;
   * an unreadable one is logged and also gives an empty rule set.
   */
  static load(root: string, fileName: string = DEFAULT_IGNORE_FILE, excludedPaths: readonly string[] = []): IgnoreFilter {
    const ignorePath = path.resolve(root, fileName);
    if (!fs.existsSync(ignorePath)) {
      return new IgnoreFilter(root, [], excludedPaths);
    }

    try {
      const rules = parseIgnoreRules(fs.readFileSync(ignorePath, 'utf8'));
      logger.debug({ ignorePath, count: rules.length }, 'Loaded ignore rules');
      return new IgnoreFilter(root, rules, excludedPaths);
    } catch (error) {
      logger.warn({ err: error, ignorePath }, 'Failed to read ignore file, continuing without rules');
      return new IgnoreFilter(root, [], excludedPaths);
    }
  }

  /** Root-relative path with `/` separators. */
  relative(target: string): string {
    return path.relative(this.root, path.resolve(this.root, target)).split(path.sep).join('/');
  }

  shouldIgnore(target: string): boolean {
    const relativePath = this.relative(target);
    if (relativePath === '') return false;
    if (this.excluded.has(relativePath)) return true;

    for (const rule of this.rules) {
      if (minimatch(relativePath, rule, { dot: true, matchBase: true })) return true;
    }
    return this.directoryPrefixes.some(prefix => relativePath.startsWith(prefix));
  }
}
