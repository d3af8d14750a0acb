import path from 'path';
import { TreeConflictError } from '../errors.js';
import type { SummaryTree } from '../types.js';

export interface BuildTreeOptions {
    /**
     * What to do when a name is needed both as a file and as a directory.
     * `error` (default) throws TreeConflictError; `overwrite` lets the later path win.
     */
    onConflict?: 'error' | 'overwrite';
    separator?: string;
}

/**
 * Nests a flat `relative path -> summary` mapping by path segment.
 */
export function buildTree(summaries: Iterable<[string, string]>, options: BuildTreeOptions = {}): SummaryTree {
    const onConflict = options.onConflict ?? 'error';
    const separator = options.separator ?? path.sep;
    const root: SummaryTree = new Map();

    for (const [filePath, summary] of summaries) {
        const parts = filePath.split(separator).filter(part => part.length > 0);
        const name = parts.pop();
        if (name === undefined) continue;

        let current = root;
        for (const part of parts) {
            const existing = current.get(part);
            if (existing instanceof Map) {
                current = existing;
                continue;
            }
            if (existing !== undefined && onConflict === 'error') {
                throw new TreeConflictError(filePath, part);
            }
            const child: SummaryTree = new Map();
            current.set(part, child);
            current = child;
        }

        if (current.get(name) instanceof Map && onConflict === 'error') {
            throw new TreeConflictError(filePath, name);
        }
        current.set(name, summary);
    }

    return root;
}

/**
 * Inverse of buildTree: depth-first `joined path -> summary` pairs.
 */
export function flattenTree(tree: SummaryTree, separator: string = path.sep): Map<string, string> {
    const flat = new Map<string, string>();
    const visit = (node: SummaryTree, parents: string[]) => {
        for (const [name, value] of node) {
            const segments = [...parents, name];
            if (typeof value === 'string') {
                flat.set(segments.join(separator), value);
            } else {
                visit(value, segments);
            }
        }
    };
    visit(tree, []);
    return flat;
}
