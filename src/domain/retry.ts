/**
 * Retry with exponential backoff for upstream calls
 */

import { logger } from './logger.js';

export interface RetryOptions {
  /** Total attempts, including the first one (default: 3) */
  attempts?: number;
  /** Delay before the second attempt; doubles after each failure (default: 300) */
  baseDelayMs?: number;
  /** Which failures are worth another attempt (default: all) */
  shouldRetry?: (error: unknown) => boolean;
  /** Injected for tests */
  sleep?: (ms: number) => Promise<void>;
}

export const DEFAULT_RETRY_ATTEMPTS = 3;
export const DEFAULT_RETRY_BASE_DELAY_MS = 300;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Backoff delay after the given failed attempt (1-based): 300, 600, 1200, ...
 */
export function backoffDelay(attempt: number, baseDelayMs: number): number {
  return baseDelayMs * 2 ** (attempt - 1);
}

/**
 * Run an operation up to `attempts` times. The last failure is re-thrown unchanged.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const attempts = options.attempts ?? DEFAULT_RETRY_ATTEMPTS;
  const baseDelayMs = options.baseDelayMs ?? DEFAULT_RETRY_BASE_DELAY_MS;
  const shouldRetry = options.shouldRetry ?? (() => true);
  const wait = options.sleep ?? sleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= attempts || !shouldRetry(error)) {
        throw error;
      }

      const delayMs = backoffDelay(attempt, baseDelayMs);
      logger.debug('Retrying upstream call', {
        attempt,
        nextAttempt: attempt + 1,
        delayMs,
        error: error instanceof Error ? error.message : String(error),
      });
      await wait(delayMs);
    }
  }
}
