/**
 * Bounded retry for transport failures (cluster API, chart repositories)
 */

import type { Logger } from 'pino';
import { getErrorMessage, isApplicationError } from '../errors';
import { DEFAULT_RETRY } from '../config/defaults';
import { retry } from './async';

export interface RetryPolicy {
  attempts: number;
  delayMs: number;
}

export const isTransient = (error: unknown): boolean =>
  isApplicationError(error) && error.retryable;

/**
 * Run `fn`, retrying only errors flagged retryable, with exponential backoff
 */
export function retryTransient<T>(
  fn: () => Promise<T>,
  logger: Logger,
  operation: string,
  policy: RetryPolicy = { attempts: DEFAULT_RETRY.attempts, delayMs: DEFAULT_RETRY.delayMs },
): Promise<T> {
  return retry(fn, {
    maxAttempts: policy.attempts,
    delayMs: policy.delayMs,
    backoff: DEFAULT_RETRY.backoff,
    maxDelayMs: DEFAULT_RETRY.maxDelayMs,
    retryIf: isTransient,
    onRetry: (error, attempt, waitMs) => {
      logger.warn(
        { operation, attempt, waitMs, error: getErrorMessage(error) },
        `${operation} failed, retrying`,
      );
    },
  });
}
