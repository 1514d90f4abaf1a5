/**
 * Payment Reconciler: turns processor confirmations into subscription time
 * exactly once.
 *
 *   RECEIVED ──verify──▶ VERIFIED ──ledger──▶ APPLIED
 *       └────────────▶ REJECTED
 *
 * The ledger insert in the store is the only point of arbitration: of any
 * number of deliveries of one paymentId, exactly one extends the
 * subscription, and the ledger entry commits in the same transaction as the
 * extension.
 */

import {
  ValidationError,
  VerificationError,
  acceptedAmounts,
  findPlan,
  getErrorMessage,
  paymentEventSchema,
  type PaymentAuditEntry,
  type PaymentEvent,
  type PaymentReconcileResult,
  type PaymentState,
  type Plan,
  type PlanCatalog,
} from '@quotapass/core';
import type { EntitlementStore } from '../db/entitlement-store.js';
import type { SubscriptionEngine } from './subscription-engine.js';
import { paymentSignaturePayload, verifyWebhookSignature } from '../lib/signature.js';
import { createLogger, type Logger } from '../lib/logger.js';

const TRANSITIONS: Record<PaymentState, readonly PaymentState[]> = {
  RECEIVED: ['VERIFIED', 'REJECTED'],
  VERIFIED: ['APPLIED'],
  APPLIED: [],
  REJECTED: [],
};

export function transition(from: PaymentState, to: PaymentState): PaymentState {
  if (!TRANSITIONS[from].includes(to)) {
    throw new Error(`Illegal payment state transition ${from} → ${to}`);
  }
  return to;
}

export interface PaymentReconcilerDeps {
  store: EntitlementStore;
  subscriptions: SubscriptionEngine;
  catalog: PlanCatalog;
  /** Shared secret the processor signs events with */
  secret: string;
  logger?: Logger;
}

type AuditSubject = Pick<PaymentAuditEntry, 'paymentId' | 'userId' | 'planId' | 'amount'>;

function readField(raw: unknown, key: string): string | null {
  if (typeof raw !== 'object' || raw === null || !(key in raw)) return null;
  const value: unknown = Reflect.get(raw, key);
  if (typeof value === 'string' || typeof value === 'number') return String(value);
  return null;
}

function subjectFromRaw(raw: unknown): AuditSubject {
  const amount = readField(raw, 'amount');
  const parsedAmount = amount === null ? NaN : Number(amount);
  return {
    paymentId: readField(raw, 'paymentId'),
    userId: readField(raw, 'userId'),
    planId: readField(raw, 'planId'),
    amount: Number.isInteger(parsedAmount) ? parsedAmount : null,
  };
}

function subjectFromEvent(event: PaymentEvent): AuditSubject {
  return {
    paymentId: event.paymentId,
    userId: event.userId,
    planId: event.planId,
    amount: event.amount,
  };
}

export class PaymentReconciler {
  private readonly log: Logger;
  /** Verification failures, kept apart for fraud monitoring */
  private readonly fraudLog: Logger;

  constructor(private readonly deps: PaymentReconcilerDeps) {
    this.log = deps.logger ?? createLogger('PaymentReconciler');
    this.fraudLog = this.log.child('fraud');
  }

  /**
   * Handle one delivery. Resolves for first applications and duplicates
   * alike; rejects with ValidationError or VerificationError for events that
   * must never be applied, and lets store failures propagate for retry.
   * A failed apply leaves no ledger entry, so a redelivery applies it.
   */
  async onPaymentConfirmed(raw: unknown, now: Date): Promise<PaymentReconcileResult> {
    let state: PaymentState = 'RECEIVED';

    const parsed = paymentEventSchema.safeParse(raw);
    if (!parsed.success) {
      const err = new ValidationError(
        'Malformed payment event',
        parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
      );
      return this.reject(state, subjectFromRaw(raw), 'validation', err, now);
    }
    const event = parsed.data;
    const subject = subjectFromEvent(event);

    const plan = findPlan(this.deps.catalog, event.planId);
    if (!plan) {
      const err = new ValidationError(`Unknown planId '${event.planId}'`, [
        { path: 'planId', message: 'Not in the plan catalog' },
      ]);
      return this.reject(state, subject, 'unknown_plan', err, now);
    }

    const verificationError = this.verify(event, plan, now);
    if (verificationError) {
      return this.reject(state, subject, verificationError.reason, verificationError, now);
    }
    state = transition(state, 'VERIFIED');

    const expiresAt = await this.deps.subscriptions.applyPurchaseOnce(
      event.userId,
      event.paymentId,
      plan.durationDays,
      now,
      plan.id,
    );
    if (expiresAt === null) {
      this.log.info('Duplicate payment delivery ignored', {
        paymentId: event.paymentId,
        userId: event.userId,
      });
      await this.audit({ ...subject, state: 'APPLIED', outcome: 'duplicate', reason: null, createdAt: now.toISOString() });
      return { paymentId: event.paymentId, userId: event.userId, state: 'APPLIED', outcome: 'duplicate' };
    }

    state = transition(state, 'APPLIED');

    this.log.info('Payment applied', {
      paymentId: event.paymentId,
      userId: event.userId,
      planId: plan.id,
      expiresAt: expiresAt.toISOString(),
    });
    await this.audit({ ...subject, state, outcome: 'applied', reason: null, createdAt: now.toISOString() });

    return {
      paymentId: event.paymentId,
      userId: event.userId,
      state: 'APPLIED',
      outcome: 'applied',
      expiresAt: expiresAt.toISOString(),
    };
  }

  private verify(event: PaymentEvent, plan: Plan, now: Date): VerificationError | null {
    const payload = paymentSignaturePayload(event);
    if (!verifyWebhookSignature(payload, event.signature, this.deps.secret)) {
      return new VerificationError('signature_mismatch', 'Payment signature does not match');
    }

    const amounts = acceptedAmounts(this.deps.catalog, plan, event.discountCode, now);
    if (event.currency !== plan.currency || !amounts.includes(event.amount)) {
      return new VerificationError(
        'amount_mismatch',
        `Amount ${event.amount} ${event.currency} is not a valid price for plan '${plan.id}'`,
      );
    }
    return null;
  }

  private async reject(
    from: PaymentState,
    subject: AuditSubject,
    reason: string,
    err: ValidationError | VerificationError,
    now: Date,
  ): Promise<never> {
    const state = transition(from, 'REJECTED');
    if (err instanceof VerificationError) {
      this.fraudLog.error('Payment event failed verification', { ...subject, reason, error: err.message });
    } else {
      this.log.error('Payment event rejected as invalid', { ...subject, reason, error: err.message });
    }
    await this.audit({ ...subject, state, outcome: 'rejected', reason, createdAt: now.toISOString() });
    throw err;
  }

  /**
   * The audit trail is for operators; losing a row must not change the
   * outcome reported to the processor.
   */
  private async audit(entry: Omit<PaymentAuditEntry, 'id'>): Promise<void> {
    try {
      await this.deps.store.recordPaymentAudit(entry);
    } catch (err) {
      this.log.error('Failed to write payment audit entry', {
        paymentId: entry.paymentId,
        outcome: entry.outcome,
        error: getErrorMessage(err),
      });
    }
  }
}
