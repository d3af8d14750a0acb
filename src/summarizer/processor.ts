import fs from 'fs';
import path from 'path';
import logger from '../logger.js';
import { FileReadError, errorMessage } from '../errors.js';
import { IgnoreFilter } from '../ignore-filter.js';
import { walkRepo } from '../scanner.js';
import type { SummarizeRunResult } from '../types.js';
import type { Summarizer } from './summarizer.js';

/**
 * Reads a file as strict UTF-8. Invalid byte sequences, permission and I/O
 * failures all surface as FileReadError.
 */
export async function readTextFile(filePath: string): Promise<string> {
    let buffer: Buffer;
    try {
        buffer = await fs.promises.readFile(filePath);
    } catch (error) {
        throw new FileReadError(filePath, errorMessage(error), error);
    }

    try {
        return new TextDecoder('utf-8', { fatal: true }).decode(buffer);
    } catch (error) {
        throw new FileReadError(filePath, 'not valid UTF-8', error);
    }
}

/**
 * Summarizes every candidate file under `root`, one at a time.
 * Per-file failures are logged and recorded in `skipped`; they never abort the run.
 */
export async function summarizeRepo(
    root: string,
    summarizer: Summarizer,
    filter: IgnoreFilter = IgnoreFilter.load(root)
): Promise<SummarizeRunResult> {
    const rootPath = path.resolve(root);
    const result: SummarizeRunResult = { summaries: new Map(), skipped: [] };

    for (const filePath of walkRepo(rootPath, filter)) {
        const relativePath = path.relative(rootPath, filePath);
        logger.info({ file: relativePath }, 'Processing file');

        let content: string;
        try {
            content = await readTextFile(filePath);
        } catch (error) {
            logger.error({ err: error, file: relativePath }, 'Skipping unreadable file');
            result.skipped.push({ path: relativePath, reason: 'read-error' });
            continue;
        }

        if (content.length === 0) {
            logger.debug({ file: relativePath }, 'Skipping empty file');
            result.skipped.push({ path: relativePath, reason: 'empty' });
            continue;
        }

        const summary = await summarizer.summarize(content, relativePath);
        if (summary === null) {
            result.skipped.push({ path: relativePath, reason: 'summary-failed' });
            continue;
        }

        result.summaries.set(relativePath, summary);
    }

    logger.info(
        { recorded: result.summaries.size, skipped: result.skipped.length },
        'Summarization finished'
    );
    return result;
}
