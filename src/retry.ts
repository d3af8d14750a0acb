/**
 * Retry policy for the summarization call, kept separate from the call itself.
 */

import logger from './logger.js';

export interface RetryPolicy {
  /** Total attempts, including the first. */
  maxAttempts: number;
  /** Delay in ms before the attempt that follows `attempt` (1-based). */
  delayMs: (attempt: number) => number;
  retryableErrors?: (error: Error) => boolean;
  onRetry?: (error: Error, attempt: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

export const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

export function fixedDelay(ms: number): (attempt: number) => number {
  return () => ms;
}

/**
 * Policy built from the `max_retries` / `retry_delay` settings (delay in seconds).
 */
export function retryPolicyFromConfig(config: { maxRetries: number; retryDelay: number }): RetryPolicy {
  return {
    maxAttempts: Math.max(1, config.maxRetries),
    delayMs: fixedDelay(config.retryDelay * 1000),
  };
}

export async function withRetry<T>(fn: (attempt: number) => Promise<T>, policy: RetryPolicy): Promise<T> {
  const maxAttempts = Math.max(1, policy.maxAttempts);
  const wait = policy.sleep ?? sleep;
  let lastError: Error = new Error('Retry failed');

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      const retryable = policy.retryableErrors ? policy.retryableErrors(lastError) : true;
      if (attempt === maxAttempts || !retryable) {
        throw lastError;
      }

      policy.onRetry?.(lastError, attempt);
      logger.warn({ error: lastError.message, attempt, maxAttempts }, 'Retrying operation');

      await wait(policy.delayMs(attempt));
    }
  }

  throw lastError;
}
