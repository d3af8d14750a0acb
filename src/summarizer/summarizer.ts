import logger from '../logger.js';
import { SummaryPermanentError, SummaryTransientError } from '../errors.js';
import { withRetry, type RetryPolicy } from '../retry.js';
import { buildSummaryPrompt, SYSTEM_PROMPT } from './prompts.js';
import type { SummaryClient } from './client.js';

export interface Summarizer {
    /** Resolves to null when the file should be skipped. */
    summarize(content: string, filePath: string): Promise<string | null>;
}

/**
 * Requests one summary per file under a bounded retry policy. Blank responses and
 * transient API failures are retried; permanent failures are not.
 */
export class FileSummarizer implements Summarizer {
    private readonly policy: RetryPolicy;

    constructor(private client: SummaryClient, policy: RetryPolicy) {
        const retryable = policy.retryableErrors;
        this.policy = {
            ...policy,
            retryableErrors: error => !(error instanceof SummaryPermanentError) && (retryable ? retryable(error) : true),
        };
    }

    async summarize(content: string, filePath: string): Promise<string | null> {
        const log = logger.child({ file: filePath });
        const request = { system: SYSTEM_PROMPT, user: buildSummaryPrompt(filePath, content) };

        try {
            return await withRetry(async attempt => {
                const summary = (await this.client.complete(request)).trim();
                if (!summary) {
                    throw new SummaryTransientError(`Empty summary (attempt ${attempt}/${this.policy.maxAttempts})`);
                }
                return summary;
            }, this.policy);
        } catch (error) {
            log.error({ err: error }, 'Giving up on file summary');
            return null;
        }
    }
}
