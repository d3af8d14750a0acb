import path from 'path';
import logger from '../logger.js';
import { DEFAULT_JSON_OUTPUT, loadTreeJson, printTree, writeTreeText } from '../output.js';
import { flattenTree } from '../tree/builder.js';
import type { SummaryTree } from '../types.js';

export interface RenderCommandOptions {
    input?: string;
    /** Text file to write; omit to skip the file. */
    output?: string;
    print?: boolean;
    write?: (text: string) => void;
}

/**
 * Loads the persisted tree and renders it to a file and/or the console.
 * @returns the loaded tree, or null when there was nothing to render
 */
export function runRender(options: RenderCommandOptions): SummaryTree | null {
    const input = path.resolve(options.input ?? DEFAULT_JSON_OUTPUT);
    const tree = loadTreeJson(input);

    if (tree.size === 0) {
        logger.warn({ input }, 'No data to visualize');
        return null;
    }

    logger.info({ input, files: flattenTree(tree).size }, 'Rendering summary tree');

    if (options.output) {
        writeTreeText(path.resolve(options.output), tree);
    }
    if (options.print) {
        printTree(tree, options.write);
    }
    return tree;
}
