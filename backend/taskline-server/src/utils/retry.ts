/**
 * Retry with exponential backoff.
 *
 * The delay before attempt n (1-based, n > 1) is baseDelayMs * 2^(n - 2),
 * capped at maxDelayMs.
 */

export interface RetryOptions {
  /** Total attempts including the first (default: 5) */
  attempts?: number;
  /** Delay before the first retry (default: 100ms) */
  baseDelayMs?: number;
  /** Upper bound for any single delay (default: 5000ms) */
  maxDelayMs?: number;
  /** Errors for which this returns false are rethrown at once */
  shouldRetry?: (error: unknown) => boolean;
  /** Called before each wait */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

export function backoffDelay(retry: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(baseDelayMs * Math.pow(2, retry - 1), maxDelayMs);
}

export async function retryWithBackoff<T>(
  fn: () => T | Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const attempts = Math.max(1, options.attempts ?? 5);
  const baseDelayMs = options.baseDelayMs ?? 100;
  const maxDelayMs = options.maxDelayMs ?? 5000;
  const shouldRetry = options.shouldRetry ?? (() => true);

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= attempts || !shouldRetry(error)) {
        throw error;
      }
      const delayMs = backoffDelay(attempt, baseDelayMs, maxDelayMs);
      options.onRetry?.(error, attempt, delayMs);
      await sleep(delayMs);
    }
  }
}
