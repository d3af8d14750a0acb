import { OpenAI } from 'openai';
import type { SummarizerConfig } from '../config.js';
import { SummaryPermanentError, SummaryTransientError, errorMessage } from '../errors.js';

export interface SummaryRequest {
    system: string;
    user: string;
}

/**
 * The language-model collaborator. Implementations reject with
 * SummaryTransientError or SummaryPermanentError.
 */
export interface SummaryClient {
    complete(request: SummaryRequest): Promise<string>;
}

// Statuses another attempt will not fix.
const PERMANENT_STATUSES = new Set([400, 401, 403, 404, 422]);

export function classifyApiError(error: unknown): SummaryTransientError | SummaryPermanentError {
    if (error instanceof SummaryTransientError || error instanceof SummaryPermanentError) return error;

    const status = statusOf(error);
    if (status !== undefined && PERMANENT_STATUSES.has(status)) {
        return new SummaryPermanentError(`API request rejected (${status}): ${errorMessage(error)}`, status, error);
    }
    return new SummaryTransientError(`API request failed: ${errorMessage(error)}`, error);
}

function statusOf(error: unknown): number | undefined {
    if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
        return error.status;
    }
    return undefined;
}

export type OpenAIClientConfig = Pick<SummarizerConfig, 'apiKey' | 'apiBase' | 'model' | 'temperature' | 'maxTokens'>;

/**
 * Chat-completions client for OpenAI and compatible endpoints.
 */
export class OpenAISummaryClient implements SummaryClient {
    private client: OpenAI;

    constructor(private config: OpenAIClientConfig) {
        this.client = new OpenAI({
            apiKey: config.apiKey,
            baseURL: config.apiBase,
            maxRetries: 0, // retries are handled by the RetryPolicy
        });
    }

    async complete(request: SummaryRequest): Promise<string> {
        try {
            const response = await this.client.chat.completions.create({
                model: this.config.model,
                messages: [
                    { role: 'system', content: request.system },
                    { role: 'user', content: request.user },
                ],
                temperature: this.config.temperature,
                max_tokens: this.config.maxTokens,
            });
            return response.choices[0]?.message?.content ?? '';
        } catch (error) {
            throw classifyApiError(error);
        }
    }
}
