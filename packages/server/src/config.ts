/**
 * Server configuration: reads from environment variables with sensible defaults.
 */

import { readFileSync } from 'node:fs';
import parser from 'cron-parser';
import {
  DEFAULT_FREE_DAILY_LIMIT,
  DEFAULT_PLAN_CATALOG,
  DEFAULT_RATE_LIMIT_MAX_CALLS,
  DEFAULT_RATE_LIMIT_PERIOD_SECONDS,
  DEFAULT_RESET_CRON,
  DEFAULT_RESET_TIMEZONE,
  DEFAULT_STORE_TIMEOUT_MS,
  assertTimeZone,
  parsePlanCatalog,
  type PlanCatalog,
} from '@quotapass/core';
import { createLogger } from './lib/logger.js';

const log = createLogger('Config');

export interface ServerConfig {
  /** Port to listen on (default: 3400) */
  port: number;
  /** CORS allowed origin (default: 'http://localhost:3400') */
  corsOrigin: string;
  /** SQLite database path (default: './quotapass.db') */
  dbPath: string;
  /** Daily downloads for a new free user (default: 3) */
  freeDailyLimit: number;
  /** IANA zone whose midnight resets quotas (default: 'UTC') */
  resetTimezone: string;
  /** Cron expression for the reset job (default: '0 0 * * *') */
  resetCron: string;
  /** Shared secret for payment event signatures */
  paymentWebhookSecret: string;
  /** Deadline for a single store call (default: 2000) */
  storeTimeoutMs: number;
  /** Rate limit window in seconds for the access route (default: 60) */
  rateLimitPeriodSeconds: number;
  /** Requests per user per window (default: 5) */
  rateLimitMaxCalls: number;
  /** Bearer token for /api/admin; admin routes are off when unset */
  adminApiKey?: string;
  /** Plans and discount codes */
  planCatalog: PlanCatalog;
}

function intFromEnv(name: string, fallback: number): number {
  const parsed = parseInt(process.env[name] ?? String(fallback), 10);
  return isNaN(parsed) ? fallback : parsed;
}

/**
 * Load the plan catalog from PLAN_CATALOG_PATH, or the built-in default.
 */
export function loadPlanCatalog(path: string | undefined): PlanCatalog {
  if (!path) return DEFAULT_PLAN_CATALOG;
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  const catalog = parsePlanCatalog(raw);
  log.info(`Loaded ${catalog.plans.length} plans from ${path}`);
  return catalog;
}

/**
 * Read configuration from environment variables.
 */
export function getConfig(): ServerConfig {
  return {
    port: intFromEnv('PORT', 3400),
    corsOrigin: process.env['CORS_ORIGIN'] ?? 'http://localhost:3400',
    dbPath: process.env['DB_PATH'] ?? './quotapass.db',
    freeDailyLimit: intFromEnv('FREE_DAILY_LIMIT', DEFAULT_FREE_DAILY_LIMIT),
    resetTimezone: process.env['RESET_TIMEZONE'] || DEFAULT_RESET_TIMEZONE,
    resetCron: process.env['RESET_CRON'] || DEFAULT_RESET_CRON,
    paymentWebhookSecret: process.env['PAYMENT_WEBHOOK_SECRET'] ?? '',
    storeTimeoutMs: intFromEnv('STORE_TIMEOUT_MS', DEFAULT_STORE_TIMEOUT_MS),
    rateLimitPeriodSeconds: intFromEnv('RATE_LIMIT_PERIOD_SECONDS', DEFAULT_RATE_LIMIT_PERIOD_SECONDS),
    rateLimitMaxCalls: intFromEnv('RATE_LIMIT_MAX_CALLS', DEFAULT_RATE_LIMIT_MAX_CALLS),
    adminApiKey: process.env['ADMIN_API_KEY'] || undefined,
    planCatalog: loadPlanCatalog(process.env['PLAN_CATALOG_PATH'] || undefined),
  };
}

/**
 * Validate config at startup. Logs warnings and throws on fatal misconfigurations.
 */
export function validateConfig(config: ServerConfig): void {
  if (!config.paymentWebhookSecret) {
    throw new Error('FATAL: PAYMENT_WEBHOOK_SECRET must be set; payment events cannot be verified without it.');
  }

  if (config.freeDailyLimit < 1) {
    throw new Error(`FATAL: FREE_DAILY_LIMIT must be at least 1, got ${config.freeDailyLimit}.`);
  }

  try {
    assertTimeZone(config.resetTimezone);
  } catch {
    throw new Error(`FATAL: RESET_TIMEZONE '${config.resetTimezone}' is not a valid IANA time zone.`);
  }

  try {
    parser.parseExpression(config.resetCron, { tz: config.resetTimezone });
  } catch {
    throw new Error(`FATAL: RESET_CRON '${config.resetCron}' is not a valid cron expression.`);
  }

  if (config.storeTimeoutMs <= 0) {
    throw new Error(`FATAL: STORE_TIMEOUT_MS must be positive, got ${config.storeTimeoutMs}.`);
  }

  if (!config.adminApiKey) {
    log.warn('⚠️  ADMIN_API_KEY is not set; admin routes are disabled.');
  }
}
