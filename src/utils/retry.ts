/**
 * Retry with Exponential Backoff
 *
 * Retries any failure with delays of baseDelay * 2^attempt. Cancellation
 * is never retried. Once retries are exhausted the last error is rethrown
 * unchanged.
 */

import { isCancellation, throwIfCancelled } from '../errors.js';
import { sleep, type SleepFn } from './sleep.js';

export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  /** Aborting interrupts a pending backoff delay */
  signal?: AbortSignal;
  /** Called before each backoff delay */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  /** Injectable sleep function for testing */
  _sleep?: SleepFn;
}

const DEFAULT_OPTIONS: Required<Pick<RetryOptions, 'maxRetries' | 'baseDelayMs' | '_sleep'>> = {
  maxRetries: 3,
  baseDelayMs: 1000,
  _sleep: sleep,
};

/**
 * Check if an error should be retried. Everything is retryable except
 * cancellation of the surrounding run.
 */
export function isRetryableError(error: unknown): boolean {
  return !isCancellation(error);
}

/**
 * Backoff delay before retry number `attempt` (0-based).
 */
export function backoffDelay(baseDelayMs: number, attempt: number): number {
  return baseDelayMs * Math.pow(2, attempt);
}

/**
 * Execute a function with retry logic and exponential backoff.
 *
 * @param fn - Async function to execute
 * @param options - Retry configuration
 * @returns The result of fn
 * @throws The last error if all retries are exhausted
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: Partial<RetryOptions> = {},
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const { maxRetries, baseDelayMs, signal, onRetry, _sleep } = opts;

  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    throwIfCancelled(signal);

    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (!isRetryableError(error)) {
        throw error;
      }

      if (attempt === maxRetries) {
        break;
      }

      const delayMs = backoffDelay(baseDelayMs, attempt);
      onRetry?.(error, attempt + 1, delayMs);
      await _sleep(delayMs, signal);
    }
  }

  throw lastError;
}
