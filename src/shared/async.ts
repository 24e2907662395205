/**
 * Async utilities for retry and sleep operations
 */

export interface RetryOptions {
  maxAttempts?: number;
  delayMs?: number;
  backoff?: number;
  maxDelayMs?: number;
  /** Only errors accepted here are retried; the rest are rethrown at once. */
  retryIf?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, waitMs: number) => void;
}

export const sleep = (ms: number): Promise<void> => new Promise<void>((r) => setTimeout(r, ms));

export async function retry<T>(
  fn: () => Promise<T>,
  {
    maxAttempts = 3,
    delayMs = 1000,
    backoff = 2,
    maxDelayMs = 30_000,
    retryIf = () => true,
    onRetry,
  }: RetryOptions = {},
): Promise<T> {
  let last: unknown;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (err) {
      last = err;
      if (attempt === maxAttempts || !retryIf(err)) break;
      const wait = Math.min(delayMs * Math.pow(backoff, attempt - 1), maxDelayMs);
      onRetry?.(err, attempt, wait);
      await sleep(wait);
    }
  }
  throw last instanceof Error ? last : new Error(String(last));
}
