/**
 * Database migration runner.
 *
 * Creates tables and indexes with CREATE ... IF NOT EXISTS so startup is
 * idempotent for the embedded database.
 */

import { sql } from 'drizzle-orm';
import type { SqliteDb } from './index.js';

export function runMigrations(db: SqliteDb): void {
  db.run(sql`
    CREATE TABLE IF NOT EXISTS user_entitlements (
      user_id TEXT PRIMARY KEY,
      daily_used INTEGER NOT NULL DEFAULT 0,
      daily_limit INTEGER NOT NULL,
      last_reset_at TEXT NOT NULL,
      subscription_expires_at TEXT,
      current_plan_id TEXT,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL,
      CHECK (daily_used >= 0)
    )
  `);
  db.run(sql`CREATE INDEX IF NOT EXISTS idx_entitlements_last_reset ON user_entitlements(last_reset_at)`);

  db.run(sql`
    CREATE TABLE IF NOT EXISTS processed_payments (
      payment_id TEXT PRIMARY KEY,
      user_id TEXT NOT NULL,
      processed_at TEXT NOT NULL
    )
  `);
  db.run(sql`CREATE INDEX IF NOT EXISTS idx_processed_payments_user ON processed_payments(user_id)`);

  db.run(sql`
    CREATE TABLE IF NOT EXISTS payment_audit (
      id TEXT PRIMARY KEY,
      payment_id TEXT,
      user_id TEXT,
      plan_id TEXT,
      amount INTEGER,
      state TEXT NOT NULL,
      outcome TEXT NOT NULL,
      reason TEXT,
      created_at TEXT NOT NULL
    )
  `);
  db.run(sql`CREATE INDEX IF NOT EXISTS idx_payment_audit_user ON payment_audit(user_id, created_at)`);
  db.run(sql`CREATE INDEX IF NOT EXISTS idx_payment_audit_payment ON payment_audit(payment_id)`);

  db.run(sql`
    CREATE TABLE IF NOT EXISTS quota_reset_log (
      id TEXT PRIMARY KEY,
      quota_day TEXT NOT NULL,
      as_of TEXT NOT NULL,
      users_reset INTEGER NOT NULL
    )
  `);
}
