/**
 * SQLite schema for quotapass: defined with Drizzle ORM.
 *
 * Tables: user_entitlements, processed_payments, payment_audit, quota_reset_log
 * Timestamps are ISO 8601 UTC strings, so string order is time order.
 */

import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';

// ─── Entitlements ─────────────────────────────────────────
export const userEntitlements = sqliteTable(
  'user_entitlements',
  {
    userId: text('user_id').primaryKey(),
    dailyUsed: integer('daily_used').notNull().default(0),
    dailyLimit: integer('daily_limit').notNull(),
    lastResetAt: text('last_reset_at').notNull(),
    subscriptionExpiresAt: text('subscription_expires_at'),
    currentPlanId: text('current_plan_id'),
    createdAt: text('created_at').notNull(),
    updatedAt: text('updated_at').notNull(),
  },
  (table) => [
    // resetAll scans by last reset
    index('idx_entitlements_last_reset').on(table.lastResetAt),
  ],
);

// ─── Idempotency Ledger ───────────────────────────────────
export const processedPayments = sqliteTable(
  'processed_payments',
  {
    paymentId: text('payment_id').primaryKey(),
    userId: text('user_id').notNull(),
    processedAt: text('processed_at').notNull(),
  },
  (table) => [index('idx_processed_payments_user').on(table.userId)],
);

// ─── Payment Audit ────────────────────────────────────────
export const paymentAudit = sqliteTable(
  'payment_audit',
  {
    id: text('id').primaryKey(), // ULID
    paymentId: text('payment_id'),
    userId: text('user_id'),
    planId: text('plan_id'),
    amount: integer('amount'),
    state: text('state', { enum: ['RECEIVED', 'VERIFIED', 'APPLIED', 'REJECTED'] }).notNull(),
    outcome: text('outcome', { enum: ['applied', 'duplicate', 'rejected'] }).notNull(),
    reason: text('reason'),
    createdAt: text('created_at').notNull(),
  },
  (table) => [
    index('idx_payment_audit_user').on(table.userId, table.createdAt),
    index('idx_payment_audit_payment').on(table.paymentId),
  ],
);

// ─── Quota Reset Log ──────────────────────────────────────
export const quotaResetLog = sqliteTable('quota_reset_log', {
  id: text('id').primaryKey(), // ULID
  quotaDay: text('quota_day').notNull(),
  asOf: text('as_of').notNull(),
  usersReset: integer('users_reset').notNull(),
});
