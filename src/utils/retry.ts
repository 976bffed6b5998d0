/**
 * Retry with exponential backoff
 *
 * Used around vector store and embedding calls. Only errors accepted by
 * `isRetryable` are retried; anything else is rethrown on the first failure.
 */

import { getLogger } from './logger.js';
import { isRetryableError } from '../errors/index.js';

export interface RetryOptions {
  /** Total attempts including the first one */
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Defaults to isRetryableError */
  isRetryable?: (error: unknown) => boolean;
  /** Label used in log lines */
  label?: string;
}

/**
 * Delay before the given retry: base * 2^(retry - 1), capped at maxDelayMs
 *
 * @param retry - 1 for the first retry
 */
export function calculateRetryDelay(retry: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(baseDelayMs * Math.pow(2, retry - 1), maxDelayMs);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const isRetryable = options.isRetryable ?? isRetryableError;
  const attempts = Math.max(1, options.attempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= attempts || !isRetryable(error)) {
        throw error;
      }

      const delayMs = calculateRetryDelay(attempt, options.baseDelayMs, options.maxDelayMs);
      getLogger().debug('retry', `${options.label ?? 'operation'} failed, retry ${attempt}/${attempts - 1} in ${delayMs}ms`, {
        error: error instanceof Error ? error.message : String(error),
      });
      await sleep(delayMs);
    }
  }
}
