/**
 * Entitlement Store: the only shared mutable state.
 *
 * Every mutation is a single conditional statement or an IMMEDIATE
 * transaction, so per-user operations serialize inside SQLite rather than in
 * process memory. Nothing is cached between calls.
 */

import { and, desc, eq, lt, sql } from 'drizzle-orm';
import { monotonicFactory } from 'ulid';
import type {
  EntitlementPatch,
  PaymentAuditEntry,
  QuotaResetLogEntry,
  UserEntitlement,
} from '@quotapass/core';
import type { SqliteDb } from './index.js';
import {
  paymentAudit,
  processedPayments,
  quotaResetLog,
  userEntitlements,
} from './schema.sqlite.js';
import { withStoreDeadline } from '../lib/db-resilience.js';
import { systemClock, type Clock } from '../lib/clock.js';

export interface ConsumeQuotaInput {
  /** Counters last reset before this instant are stale */
  boundary: Date;
  now: Date;
}

export interface ConsumeQuotaResult {
  consumed: boolean;
  record: UserEntitlement;
}

export interface EntitlementStore {
  /** Returns the record, creating and persisting the default when absent. */
  get(userId: string): Promise<UserEntitlement>;
  /** Atomic partial update; `lastResetAt` never moves backwards. */
  save(patch: EntitlementPatch): Promise<UserEntitlement>;
  /** `true` for exactly one caller per paymentId, `false` for every duplicate. */
  markPaymentProcessed(userId: string, paymentId: string): Promise<boolean>;
  /** Reset-if-stale, then increment-if-below-limit, atomically. */
  consumeQuota(userId: string, input: ConsumeQuotaInput): Promise<ConsumeQuotaResult>;
  /** Reset every counter last reset before `boundary`; returns the count. */
  resetAllBefore(boundary: Date, asOf: Date): Promise<number>;
  /** Read the expiry and write `compute(current)` in one transaction. */
  extendSubscription(
    userId: string,
    compute: (currentExpiry: Date | null) => Date,
    planId?: string,
  ): Promise<Date>;
  /**
   * Ledger insert and expiry update in one transaction. Returns the new
   * expiry, or `null` when `paymentId` was already applied. If `compute`
   * throws, neither write happens.
   */
  applyPaymentOnce(
    userId: string,
    paymentId: string,
    compute: (currentExpiry: Date | null) => Date,
    planId?: string,
  ): Promise<Date | null>;
  recordPaymentAudit(entry: Omit<PaymentAuditEntry, 'id'>): Promise<PaymentAuditEntry>;
  listPaymentAudit(userId: string, limit?: number): Promise<PaymentAuditEntry[]>;
  recordQuotaReset(entry: Omit<QuotaResetLogEntry, 'id'>): Promise<QuotaResetLogEntry>;
  listQuotaResets(limit?: number): Promise<QuotaResetLogEntry[]>;
}

export interface SqliteEntitlementStoreOptions {
  /** dailyLimit written into new records */
  defaultDailyLimit: number;
  clock?: Clock;
}

/** Sortable ids, strictly increasing within one process */
const nextId = monotonicFactory();

type Tx = Parameters<Parameters<SqliteDb['transaction']>[0]>[0];
type EntitlementRow = typeof userEntitlements.$inferSelect;

function toEntitlement(row: EntitlementRow, paymentIds: string[]): UserEntitlement {
  return {
    userId: row.userId,
    dailyUsed: row.dailyUsed,
    dailyLimit: row.dailyLimit,
    lastResetAt: row.lastResetAt,
    subscriptionExpiresAt: row.subscriptionExpiresAt,
    currentPlanId: row.currentPlanId,
    processedPaymentIds: paymentIds,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

export class SqliteEntitlementStore implements EntitlementStore {
  private readonly clock: Clock;

  constructor(
    private readonly db: SqliteDb,
    private readonly options: SqliteEntitlementStoreOptions,
  ) {
    this.clock = options.clock ?? systemClock;
  }

  async get(userId: string): Promise<UserEntitlement> {
    return this.db.transaction((tx) => {
      this.ensure(tx, userId);
      return this.read(tx, userId);
    }, { behavior: 'immediate' });
  }

  async save(patch: EntitlementPatch): Promise<UserEntitlement> {
    const { userId, lastResetAt, ...rest } = patch;
    return this.db.transaction((tx) => {
      this.ensure(tx, userId);
      tx.update(userEntitlements)
        .set({
          ...rest,
          ...(lastResetAt !== undefined
            ? { lastResetAt: sql`max(${userEntitlements.lastResetAt}, ${lastResetAt})` }
            : {}),
          updatedAt: this.clock.now().toISOString(),
        })
        .where(eq(userEntitlements.userId, userId))
        .run();
      return this.read(tx, userId);
    }, { behavior: 'immediate' });
  }

  async markPaymentProcessed(userId: string, paymentId: string): Promise<boolean> {
    return this.db.transaction((tx) => {
      this.ensure(tx, userId);
      return this.insertLedgerEntry(tx, userId, paymentId);
    }, { behavior: 'immediate' });
  }

  async consumeQuota(userId: string, input: ConsumeQuotaInput): Promise<ConsumeQuotaResult> {
    const nowIso = input.now.toISOString();
    const boundaryIso = input.boundary.toISOString();

    return this.db.transaction((tx) => {
      this.ensure(tx, userId, input.now);

      tx.update(userEntitlements)
        .set({
          dailyUsed: 0,
          lastResetAt: sql`max(${userEntitlements.lastResetAt}, ${nowIso})`,
          updatedAt: nowIso,
        })
        .where(and(eq(userEntitlements.userId, userId), lt(userEntitlements.lastResetAt, boundaryIso)))
        .run();

      const increment = tx
        .update(userEntitlements)
        .set({ dailyUsed: sql`${userEntitlements.dailyUsed} + 1`, updatedAt: nowIso })
        .where(and(
          eq(userEntitlements.userId, userId),
          lt(userEntitlements.dailyUsed, userEntitlements.dailyLimit),
        ))
        .run();

      return { consumed: increment.changes === 1, record: this.read(tx, userId) };
    }, { behavior: 'immediate' });
  }

  async resetAllBefore(boundary: Date, asOf: Date): Promise<number> {
    const asOfIso = asOf.toISOString();
    const result = this.db
      .update(userEntitlements)
      .set({
        dailyUsed: 0,
        lastResetAt: sql`max(${userEntitlements.lastResetAt}, ${asOfIso})`,
        updatedAt: asOfIso,
      })
      .where(lt(userEntitlements.lastResetAt, boundary.toISOString()))
      .run();
    return result.changes;
  }

  async extendSubscription(
    userId: string,
    compute: (currentExpiry: Date | null) => Date,
    planId?: string,
  ): Promise<Date> {
    return this.db.transaction((tx) => {
      this.ensure(tx, userId);
      return this.writeExpiry(tx, userId, compute, planId);
    }, { behavior: 'immediate' });
  }

  async applyPaymentOnce(
    userId: string,
    paymentId: string,
    compute: (currentExpiry: Date | null) => Date,
    planId?: string,
  ): Promise<Date | null> {
    return this.db.transaction((tx) => {
      this.ensure(tx, userId);
      if (!this.insertLedgerEntry(tx, userId, paymentId)) return null;
      return this.writeExpiry(tx, userId, compute, planId);
    }, { behavior: 'immediate' });
  }

  async recordPaymentAudit(entry: Omit<PaymentAuditEntry, 'id'>): Promise<PaymentAuditEntry> {
    const row: PaymentAuditEntry = { id: nextId(), ...entry };
    this.db.insert(paymentAudit).values(row).run();
    return row;
  }

  async listPaymentAudit(userId: string, limit = 50): Promise<PaymentAuditEntry[]> {
    return this.db
      .select()
      .from(paymentAudit)
      .where(eq(paymentAudit.userId, userId))
      .orderBy(desc(paymentAudit.createdAt), desc(paymentAudit.id))
      .limit(limit)
      .all();
  }

  async recordQuotaReset(entry: Omit<QuotaResetLogEntry, 'id'>): Promise<QuotaResetLogEntry> {
    const row: QuotaResetLogEntry = { id: nextId(), ...entry };
    this.db.insert(quotaResetLog).values(row).run();
    return row;
  }

  async listQuotaResets(limit = 30): Promise<QuotaResetLogEntry[]> {
    return this.db
      .select()
      .from(quotaResetLog)
      .orderBy(desc(quotaResetLog.id))
      .limit(limit)
      .all();
  }

  // ─── Helpers ─────────────────────────────────────────────

  private ensure(tx: Tx, userId: string, at: Date = this.clock.now()): void {
    const nowIso = at.toISOString();
    tx.insert(userEntitlements)
      .values({
        userId,
        dailyUsed: 0,
        dailyLimit: this.options.defaultDailyLimit,
        lastResetAt: nowIso,
        subscriptionExpiresAt: null,
        currentPlanId: null,
        createdAt: nowIso,
        updatedAt: nowIso,
      })
      .onConflictDoNothing()
      .run();
  }

  private insertLedgerEntry(tx: Tx, userId: string, paymentId: string): boolean {
    const result = tx
      .insert(processedPayments)
      .values({ paymentId, userId, processedAt: this.clock.now().toISOString() })
      .onConflictDoNothing()
      .run();
    return result.changes === 1;
  }

  private writeExpiry(
    tx: Tx,
    userId: string,
    compute: (currentExpiry: Date | null) => Date,
    planId: string | undefined,
  ): Date {
    const row = tx
      .select({ expiresAt: userEntitlements.subscriptionExpiresAt })
      .from(userEntitlements)
      .where(eq(userEntitlements.userId, userId))
      .get();

    const next = compute(row?.expiresAt ? new Date(row.expiresAt) : null);

    tx.update(userEntitlements)
      .set({
        subscriptionExpiresAt: next.toISOString(),
        ...(planId !== undefined ? { currentPlanId: planId } : {}),
        updatedAt: this.clock.now().toISOString(),
      })
      .where(eq(userEntitlements.userId, userId))
      .run();
    return next;
  }

  private read(tx: Tx, userId: string): UserEntitlement {
    const row = tx
      .select()
      .from(userEntitlements)
      .where(eq(userEntitlements.userId, userId))
      .get();
    if (!row) {
      throw new Error(`Entitlement for user ${userId} missing after upsert`);
    }
    const payments = tx
      .select({ paymentId: processedPayments.paymentId })
      .from(processedPayments)
      .where(eq(processedPayments.userId, userId))
      .orderBy(processedPayments.processedAt)
      .all();
    return toEntitlement(row, payments.map((p) => p.paymentId));
  }
}

/**
 * Maps lock contention on every call of the wrapped store to
 * TransientStoreError, and bounds calls of an asynchronous store by
 * `timeoutMs`.
 *
 * A better-sqlite3 store finishes each call before any timer can fire, so
 * its bound is the connection's `busy_timeout` (see `createDb`), which
 * raises SQLITE_BUSY once a lock wait exceeds it.
 */
export class TimedEntitlementStore implements EntitlementStore {
  constructor(
    private readonly inner: EntitlementStore,
    private readonly timeoutMs: number,
  ) {}

  get(userId: string): Promise<UserEntitlement> {
    return withStoreDeadline('get', this.timeoutMs, () => this.inner.get(userId));
  }

  save(patch: EntitlementPatch): Promise<UserEntitlement> {
    return withStoreDeadline('save', this.timeoutMs, () => this.inner.save(patch));
  }

  markPaymentProcessed(userId: string, paymentId: string): Promise<boolean> {
    return withStoreDeadline('markPaymentProcessed', this.timeoutMs, () =>
      this.inner.markPaymentProcessed(userId, paymentId),
    );
  }

  consumeQuota(userId: string, input: ConsumeQuotaInput): Promise<ConsumeQuotaResult> {
    return withStoreDeadline('consumeQuota', this.timeoutMs, () => this.inner.consumeQuota(userId, input));
  }

  resetAllBefore(boundary: Date, asOf: Date): Promise<number> {
    return withStoreDeadline('resetAllBefore', this.timeoutMs, () => this.inner.resetAllBefore(boundary, asOf));
  }

  extendSubscription(
    userId: string,
    compute: (currentExpiry: Date | null) => Date,
    planId?: string,
  ): Promise<Date> {
    return withStoreDeadline('extendSubscription', this.timeoutMs, () =>
      this.inner.extendSubscription(userId, compute, planId),
    );
  }

  applyPaymentOnce(
    userId: string,
    paymentId: string,
    compute: (currentExpiry: Date | null) => Date,
    planId?: string,
  ): Promise<Date | null> {
    return withStoreDeadline('applyPaymentOnce', this.timeoutMs, () =>
      this.inner.applyPaymentOnce(userId, paymentId, compute, planId),
    );
  }

  recordPaymentAudit(entry: Omit<PaymentAuditEntry, 'id'>): Promise<PaymentAuditEntry> {
    return withStoreDeadline('recordPaymentAudit', this.timeoutMs, () => this.inner.recordPaymentAudit(entry));
  }

  listPaymentAudit(userId: string, limit?: number): Promise<PaymentAuditEntry[]> {
    return withStoreDeadline('listPaymentAudit', this.timeoutMs, () => this.inner.listPaymentAudit(userId, limit));
  }

  recordQuotaReset(entry: Omit<QuotaResetLogEntry, 'id'>): Promise<QuotaResetLogEntry> {
    return withStoreDeadline('recordQuotaReset', this.timeoutMs, () => this.inner.recordQuotaReset(entry));
  }

  listQuotaResets(limit?: number): Promise<QuotaResetLogEntry[]> {
    return withStoreDeadline('listQuotaResets', this.timeoutMs, () => this.inner.listQuotaResets(limit));
  }
}
