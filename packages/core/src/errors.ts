/**
 * Error types shared by the entitlement engines and the HTTP surface.
 *
 * Duplicate payment deliveries and exhausted quotas are results, not errors,
 * so they have no class here.
 */

/**
 * Safely extract an error message from an unknown catch value.
 */
export function getErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  return 'Unknown error';
}

export interface ValidationIssue {
  path: string;
  message: string;
}

/**
 * Thrown when an inbound payload is malformed or references an unknown plan.
 * Terminal for the event: it is never retried.
 */
export class ValidationError extends Error {
  readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = []) {
    super(message);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

export type VerificationFailure = 'signature_mismatch' | 'amount_mismatch';

/**
 * Thrown when a payment event fails authenticity or pricing checks.
 * Surfaced to operators as a potential fraud signal.
 */
export class VerificationError extends Error {
  readonly reason: VerificationFailure;

  constructor(reason: VerificationFailure, message: string) {
    super(message);
    this.name = 'VerificationError';
    this.reason = reason;
  }
}

/**
 * Thrown when the entitlement store times out or is temporarily unavailable.
 * The whole operation may be retried by the caller.
 */
export class TransientStoreError extends Error {
  readonly operation: string;

  constructor(operation: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransientStoreError';
    this.operation = operation;
  }
}

export function isTransientStoreError(err: unknown): err is TransientStoreError {
  return err instanceof TransientStoreError;
}
