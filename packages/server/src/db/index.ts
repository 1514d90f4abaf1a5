/**
 * Database initialization.
 *
 * SQLite via better-sqlite3 in WAL mode with tuned pragmas.
 */

import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema.sqlite.js';

export type SqliteDb = BetterSQLite3Database<typeof schema>;

export interface CreateDbOptions {
  /** SQLite file path (default: './quotapass.db'). Use ':memory:' for tests. */
  databasePath?: string;
  /** Longest wait for a lock before a statement fails with SQLITE_BUSY (default: 5000) */
  busyTimeoutMs?: number;
}

/**
 * Create a database connection.
 *
 * Applies:
 * - journal_mode=WAL (concurrent read/write)
 * - synchronous=NORMAL (durability/performance balance)
 * - busy_timeout (lock wait before SQLITE_BUSY, default 5s)
 */
export function createDb(options: CreateDbOptions = {}): SqliteDb {
  const dbPath = options.databasePath ?? process.env['DB_PATH'] ?? './quotapass.db';
  const sqlite = new Database(dbPath);

  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('synchronous = NORMAL');
  sqlite.pragma(`busy_timeout = ${Math.max(0, Math.floor(options.busyTimeoutMs ?? 5000))}`);

  return drizzle(sqlite, { schema });
}

/**
 * Create an in-memory SQLite database for testing.
 */
export function createTestDb(): SqliteDb {
  return createDb({ databasePath: ':memory:' });
}
