import { describe, it, expect, vi, afterEach } from 'vitest';
import { TransientStoreError, ValidationError } from '@quotapass/core';
import { isRetryableSqliteError, withRetry, withStoreDeadline } from '../db-resilience.js';

function sqliteError(code: string, message = 'sqlite error'): Error {
  return Object.assign(new Error(message), { code });
}

function transient(message = 'timed out'): TransientStoreError {
  return new TransientStoreError('consumeQuota', message);
}

describe('withRetry', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('succeeds on first try without retrying', async () => {
    const fn = vi.fn().mockResolvedValue('ok');
    expect(await withRetry(fn)).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('retries a transient failure and succeeds', async () => {
    const fn = vi.fn().mockRejectedValueOnce(transient()).mockResolvedValue('ok');
    expect(await withRetry(fn, { baseDelayMs: 1 })).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('propagates other errors immediately', async () => {
    const fn = vi.fn().mockRejectedValue(new ValidationError('bad event'));
    await expect(withRetry(fn, { baseDelayMs: 1 })).rejects.toThrow('bad event');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('does not retry raw SQLite errors', async () => {
    const fn = vi.fn().mockRejectedValue(sqliteError('SQLITE_BUSY', 'database is locked'));
    await expect(withRetry(fn, { baseDelayMs: 1 })).rejects.toThrow('database is locked');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('throws the last error after exhausting retries', async () => {
    const fn = vi.fn().mockRejectedValue(transient('still down'));
    await expect(withRetry(fn, { maxRetries: 2, baseDelayMs: 1 })).rejects.toThrow('still down');
    expect(fn).toHaveBeenCalledTimes(3); // initial + 2 retries
  });

  it('backs off exponentially', async () => {
    vi.useFakeTimers();
    try {
      const fn = vi.fn()
        .mockRejectedValueOnce(transient())
        .mockRejectedValueOnce(transient())
        .mockResolvedValue('done');

      const timeoutSpy = vi.spyOn(globalThis, 'setTimeout');
      const promise = withRetry(fn, { maxRetries: 3, baseDelayMs: 100 });

      await vi.runAllTimersAsync();

      expect(fn).toHaveBeenCalledTimes(3);
      expect(timeoutSpy.mock.calls.map((call) => call[1])).toEqual([100, 200]);
      expect(await promise).toBe('done');
    } finally {
      vi.useRealTimers();
    }
  });
});

describe('isRetryableSqliteError', () => {
  it('recognizes lock contention codes', () => {
    for (const code of ['SQLITE_BUSY', 'SQLITE_BUSY_SNAPSHOT', 'SQLITE_LOCKED']) {
      expect(isRetryableSqliteError(sqliteError(code))).toBe(true);
    }
  });

  it('rejects other errors', () => {
    expect(isRetryableSqliteError(sqliteError('SQLITE_CONSTRAINT_PRIMARYKEY'))).toBe(false);
    expect(isRetryableSqliteError(new Error('plain'))).toBe(false);
    expect(isRetryableSqliteError('SQLITE_BUSY')).toBe(false);
  });
});

describe('withStoreDeadline', () => {
  it('returns the result of a fast call', async () => {
    expect(await withStoreDeadline('get', 50, async () => 42)).toBe(42);
  });

  it('fails a slow call as transient', async () => {
    const slow = () => new Promise<number>((resolve) => setTimeout(() => resolve(1), 200));
    await expect(withStoreDeadline('get', 10, slow)).rejects.toThrow(TransientStoreError);
  });

  it('wraps lock contention and keeps the cause', async () => {
    const busy = sqliteError('SQLITE_BUSY', 'database is locked');
    const err: unknown = await withStoreDeadline('save', 50, async () => {
      throw busy;
    }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TransientStoreError);
    if (err instanceof TransientStoreError) {
      expect(err.operation).toBe('save');
      expect(err.cause).toBe(busy);
    }
  });

  it('passes other failures through untouched', async () => {
    const boom = new Error('constraint failed');
    await expect(withStoreDeadline('save', 50, async () => {
      throw boom;
    })).rejects.toBe(boom);
  });
});
