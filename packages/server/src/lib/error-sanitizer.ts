/**
 * Error sanitization utilities: prevents leaking internal details to clients.
 */

import {
  ValidationError,
  VerificationError,
  isTransientStoreError,
  type ValidationIssue,
} from '@quotapass/core';

const GENERIC_5XX = 'Internal server error';

/**
 * Patterns that must never reach the client (SQLite internals, file paths, stack traces).
 */
const SENSITIVE_PATTERNS = [
  /SQLITE_/i,
  /\/home\//,
  /\/usr\//,
  /\/tmp\//,
  /\\Users\\/,
  /at\s+\S+\s+\(.*:\d+:\d+\)/, // stack trace frames
  /node_modules/,
  /\.ts:\d+/,
  /\.js:\d+/,
];

/**
 * Returns a safe, client-facing error message.
 * - ValidationError / VerificationError: the explicit message.
 * - Everything else: generic "Internal server error".
 */
export function sanitizeErrorMessage(err: unknown): string {
  if (err instanceof ValidationError || err instanceof VerificationError) {
    const msg = err.message;
    if (SENSITIVE_PATTERNS.some((p) => p.test(msg))) {
      return 'Bad request';
    }
    return msg;
  }
  return GENERIC_5XX;
}

export type ErrorStatus = 400 | 401 | 500 | 503;

/**
 * HTTP status for an error that escaped a handler.
 */
export function errorStatus(err: unknown): ErrorStatus {
  if (err instanceof ValidationError) return 400;
  if (err instanceof VerificationError) return 401;
  if (isTransientStoreError(err)) return 503;
  return 500;
}

/**
 * JSON body for an error that escaped a handler. Transient store failures
 * are reported as `temporarily_unavailable` so callers retry instead of
 * treating the request as allowed or denied.
 */
export function errorBody(err: unknown): { error: string; status: ErrorStatus; details?: ValidationIssue[] } {
  const status = errorStatus(err);
  if (status === 503) return { error: 'temporarily_unavailable', status };
  if (err instanceof ValidationError && err.issues.length > 0) {
    return { error: sanitizeErrorMessage(err), status, details: err.issues };
  }
  return { error: sanitizeErrorMessage(err), status };
}
