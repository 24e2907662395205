import { describe, it, expect, jest } from '@jest/globals';
import { retry } from '../../../src/shared/async';
import { isTransient, retryTransient } from '../../../src/shared/transient';
import {
  ClusterUnreachableError,
  NotAuthorizedError,
  RepoUnreachableError,
} from '../../../src/errors';
import { createTestLogger } from '../../utils/logger';

describe('isTransient', () => {
  it('should accept only retryable application errors', () => {
    expect(isTransient(new ClusterUnreachableError('i/o timeout'))).toBe(true);
    expect(isTransient(new RepoUnreachableError('no such host'))).toBe(true);
    expect(isTransient(new NotAuthorizedError('forbidden'))).toBe(false);
    expect(isTransient(new Error('ECONNREFUSED'))).toBe(false);
  });
});

describe('retry', () => {
  it('should back off exponentially up to the cap', async () => {
    const waits: number[] = [];
    const fn = jest.fn(async (): Promise<string> => {
      throw new Error('down');
    });

    await expect(
      retry(fn, {
        maxAttempts: 4,
        delayMs: 1,
        backoff: 3,
        maxDelayMs: 5,
        onRetry: (_error, _attempt, waitMs) => waits.push(waitMs),
      }),
    ).rejects.toThrow('down');
    expect(fn).toHaveBeenCalledTimes(4);
    expect(waits).toEqual([1, 3, 5]);
  });

  it('should wrap a thrown value that is not an Error', async () => {
    await expect(
      retry(
        async () => {
          throw 'plain';
        },
        { maxAttempts: 1 },
      ),
    ).rejects.toThrow('plain');
  });
});

describe('retryTransient', () => {
  it('should retry transient failures and log each retry', async () => {
    const logger = createTestLogger();
    const warn = jest.spyOn(logger, 'warn');
    const fn = jest
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new ClusterUnreachableError('i/o timeout'))
      .mockResolvedValueOnce('listed');

    await expect(
      retryTransient(fn, logger, 'list pods', { attempts: 3, delayMs: 0 }),
    ).resolves.toBe('listed');
    expect(fn).toHaveBeenCalledTimes(2);
    expect(warn).toHaveBeenCalledWith(
      { operation: 'list pods', attempt: 1, waitMs: 0, error: 'i/o timeout' },
      'list pods failed, retrying',
    );
  });

  it('should rethrow other failures at once', async () => {
    const fn = jest
      .fn<() => Promise<string>>()
      .mockRejectedValue(new NotAuthorizedError('forbidden'));

    await expect(
      retryTransient(fn, createTestLogger(), 'create policy', { attempts: 3, delayMs: 0 }),
    ).rejects.toBeInstanceOf(NotAuthorizedError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should give up after the configured attempts', async () => {
    const fn = jest
      .fn<() => Promise<string>>()
      .mockRejectedValue(new RepoUnreachableError('no such host'));

    await expect(
      retryTransient(fn, createTestLogger(), 'helm repo add', { attempts: 2, delayMs: 0 }),
    ).rejects.toBeInstanceOf(RepoUnreachableError);
    expect(fn).toHaveBeenCalledTimes(2);
  });
});
