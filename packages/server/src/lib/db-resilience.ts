/**
 * Store resilience utilities: retry with exponential backoff for transient
 * store failures, and a deadline for a single store call.
 */

import { TransientStoreError, isTransientStoreError, getErrorMessage } from '@quotapass/core';
import { createLogger } from './logger.js';

const log = createLogger('db-resilience');

export interface RetryOptions {
  /** Retries after the first attempt (default 3). */
  maxRetries?: number;
  /** Base delay in ms for exponential backoff (default 100). */
  baseDelayMs?: number;
}

/** SQLite result codes worth retrying. */
const RETRYABLE_SQLITE_CODES = new Set([
  'SQLITE_BUSY',
  'SQLITE_BUSY_SNAPSHOT',
  'SQLITE_BUSY_TIMEOUT',
  'SQLITE_LOCKED',
  'SQLITE_LOCKED_SHAREDCACHE',
]);

export function isRetryableSqliteError(err: unknown): boolean {
  if (typeof err === 'object' && err !== null && 'code' in err) {
    const { code } = err;
    return typeof code === 'string' && RETRYABLE_SQLITE_CODES.has(code);
  }
  return false;
}

/**
 * Execute `fn` again on TransientStoreError. Anything else propagates
 * immediately, as does the last transient failure.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options?: RetryOptions,
): Promise<T> {
  const maxRetries = options?.maxRetries ?? 3;
  const baseDelayMs = options?.baseDelayMs ?? 100;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (!isTransientStoreError(err) || attempt >= maxRetries) {
        throw err;
      }
      const delay = baseDelayMs * Math.pow(2, attempt);
      log.warn(`Transient store error (attempt ${attempt + 1}/${maxRetries + 1}), retrying in ${delay}ms`, {
        operation: err.operation,
        message: err.message,
      });
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }
}

/**
 * Run one store call under a deadline. Lock contention and the deadline both
 * surface as TransientStoreError; other failures pass through untouched.
 *
 * The deadline can only fire while `fn` is awaiting I/O. A synchronous call
 * (better-sqlite3) holds the event loop until it returns, so for those the
 * connection's busy_timeout is the bound.
 */
export async function withStoreDeadline<T>(
  operation: string,
  timeoutMs: number,
  fn: () => Promise<T>,
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new TransientStoreError(operation, `Store operation '${operation}' timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(), deadline]);
  } catch (err) {
    if (isRetryableSqliteError(err)) {
      throw new TransientStoreError(operation, getErrorMessage(err), { cause: err });
    }
    throw err;
  } finally {
    clearTimeout(timer);
  }
}
