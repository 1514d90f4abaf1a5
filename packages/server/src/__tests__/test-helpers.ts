/**
 * Shared test helpers: in-memory store, a settable clock, signed events.
 */

import type { Hono } from 'hono';
import { DEFAULT_PLAN_CATALOG, type PaymentEventInput, type PlanCatalog } from '@quotapass/core';
import { createApp, createServices, type AppConfig, type AppServices } from '../index.js';
import { createTestDb, type SqliteDb } from '../db/index.js';
import { runMigrations } from '../db/migrate.js';
import { SqliteEntitlementStore } from '../db/entitlement-store.js';
import { signPaymentEvent } from '../lib/signature.js';
import type { Clock } from '../lib/clock.js';

export const TEST_SECRET = 'test-secret';
export const TEST_ADMIN_KEY = 'test-admin-key';

export class TestClock implements Clock {
  private current: Date;

  constructor(start: string | Date) {
    this.current = new Date(start);
  }

  now(): Date {
    return new Date(this.current.getTime());
  }

  set(at: string | Date): void {
    this.current = new Date(at);
  }

  advance(ms: number): void {
    this.current = new Date(this.current.getTime() + ms);
  }
}

export interface TestStore {
  db: SqliteDb;
  store: SqliteEntitlementStore;
  clock: TestClock;
}

export function createTestStore(opts: { start?: string; defaultDailyLimit?: number } = {}): TestStore {
  const db = createTestDb();
  runMigrations(db);
  const clock = new TestClock(opts.start ?? '2025-03-10T08:00:00.000Z');
  const store = new SqliteEntitlementStore(db, {
    defaultDailyLimit: opts.defaultDailyLimit ?? 3,
    clock,
  });
  return { db, store, clock };
}

export interface TestServices extends TestStore {
  services: AppServices;
}

export function createTestServices(
  opts: { start?: string; defaultDailyLimit?: number; timeZone?: string; catalog?: PlanCatalog } = {},
): TestServices {
  const base = createTestStore(opts);
  const services = createServices(
    base.store,
    {
      resetTimezone: opts.timeZone ?? 'UTC',
      resetCron: '0 0 * * *',
      paymentWebhookSecret: TEST_SECRET,
      planCatalog: opts.catalog ?? DEFAULT_PLAN_CATALOG,
    },
    { clock: base.clock, retry: { maxRetries: 1, baseDelayMs: 1 } },
  );
  return { ...base, services };
}

export interface TestApp extends TestServices {
  app: Hono;
}

export function createTestApp(
  opts: Parameters<typeof createTestServices>[0] & { app?: Partial<AppConfig> } = {},
): TestApp {
  const ctx = createTestServices(opts);
  const app = createApp(ctx.services, {
    corsOrigin: '*',
    rateLimitMaxCalls: 100,
    rateLimitPeriodSeconds: 60,
    adminApiKey: TEST_ADMIN_KEY,
    retry: { maxRetries: 1, baseDelayMs: 1 },
    ...opts.app,
  });
  return { ...ctx, app };
}

/**
 * A monthly-plan confirmation, signed with TEST_SECRET unless `signature`
 * is given.
 */
export function signedEvent(
  overrides: Partial<PaymentEventInput> = {},
  secret: string = TEST_SECRET,
): PaymentEventInput {
  const fields = {
    paymentId: 'pay_001',
    userId: 'user-1',
    planId: 'monthly',
    amount: 4900,
    currency: 'INR',
    ...overrides,
  };
  return {
    ...fields,
    signature: overrides.signature ?? signPaymentEvent(fields, secret),
  };
}

export function jsonRequest(method: string, body: unknown, headers: Record<string, string> = {}): RequestInit {
  return {
    method,
    headers: { 'Content-Type': 'application/json', ...headers },
    body: JSON.stringify(body),
  };
}

export function adminHeaders(key: string = TEST_ADMIN_KEY): Record<string, string> {
  return { Authorization: `Bearer ${key}` };
}
