/**
 * @quotapass/server: entitlement engines and the Hono HTTP API
 *
 * Exports:
 * - createServices(store, config): wires the engines over one store
 * - createApp(services, config?): factory that returns a configured Hono app
 * - startServer(): standalone entry point that creates DB + starts listening
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import { HTTPException } from 'hono/http-exception';
import { serve } from '@hono/node-server';
import { getErrorMessage, type PlanCatalog } from '@quotapass/core';
import { getConfig, validateConfig, type ServerConfig } from './config.js';
import { createDb } from './db/index.js';
import { runMigrations } from './db/migrate.js';
import {
  SqliteEntitlementStore,
  TimedEntitlementStore,
  type EntitlementStore,
} from './db/entitlement-store.js';
import { QuotaEngine } from './services/quota-engine.js';
import { SubscriptionEngine } from './services/subscription-engine.js';
import { PaymentReconciler } from './services/payment-reconciler.js';
import { AccessDecision } from './services/access-decision.js';
import { QuotaResetScheduler } from './lib/quota-reset-scheduler.js';
import { errorBody } from './lib/error-sanitizer.js';
import { apiBodyLimit } from './middleware/body-limit.js';
import { systemClock, type Clock } from './lib/clock.js';
import type { RetryOptions } from './lib/db-resilience.js';
import { createLogger } from './lib/logger.js';
import { accessRoutes } from './routes/access.js';
import { usersRoutes } from './routes/users.js';
import { paymentsRoutes } from './routes/payments.js';
import { plansRoutes } from './routes/plans.js';
import { adminRoutes } from './routes/admin.js';
import { healthRoutes } from './routes/health.js';

// Re-export everything consumers may need
export { getConfig, validateConfig, loadPlanCatalog } from './config.js';
export type { ServerConfig } from './config.js';
export { createDb, createTestDb } from './db/index.js';
export type { SqliteDb } from './db/index.js';
export { runMigrations } from './db/migrate.js';
export { SqliteEntitlementStore, TimedEntitlementStore } from './db/entitlement-store.js';
export type { EntitlementStore, ConsumeQuotaInput, ConsumeQuotaResult } from './db/entitlement-store.js';
export { QuotaEngine } from './services/quota-engine.js';
export { SubscriptionEngine } from './services/subscription-engine.js';
export { PaymentReconciler, transition } from './services/payment-reconciler.js';
export { AccessDecision } from './services/access-decision.js';
export { QuotaResetScheduler } from './lib/quota-reset-scheduler.js';
export { signPaymentEvent, verifyWebhookSignature } from './lib/signature.js';
export { withRetry, withStoreDeadline } from './lib/db-resilience.js';
export { createLogger } from './lib/logger.js';
export type { Logger } from './lib/logger.js';
export type { Clock } from './lib/clock.js';

const log = createLogger('Server');

export interface AppServices {
  store: EntitlementStore;
  quota: QuotaEngine;
  subscriptions: SubscriptionEngine;
  access: AccessDecision;
  reconciler: PaymentReconciler;
  scheduler: QuotaResetScheduler;
  catalog: PlanCatalog;
  clock: Clock;
}

export type ServicesConfig = Pick<
  ServerConfig,
  'resetTimezone' | 'resetCron' | 'paymentWebhookSecret' | 'planCatalog'
>;

/**
 * Wire the engines over one store. The store is the only shared state.
 */
export function createServices(
  store: EntitlementStore,
  config: ServicesConfig,
  options: { clock?: Clock; retry?: RetryOptions } = {},
): AppServices {
  const clock = options.clock ?? systemClock;
  const quota = new QuotaEngine(store, { timeZone: config.resetTimezone });
  const subscriptions = new SubscriptionEngine(store);
  const access = new AccessDecision({ store, quota, subscriptions });
  const reconciler = new PaymentReconciler({
    store,
    subscriptions,
    catalog: config.planCatalog,
    secret: config.paymentWebhookSecret,
  });
  const scheduler = new QuotaResetScheduler(quota, {
    cron: config.resetCron,
    timeZone: config.resetTimezone,
    clock,
    retry: options.retry,
  });

  return { store, quota, subscriptions, access, reconciler, scheduler, catalog: config.planCatalog, clock };
}

export type AppConfig = Pick<
  ServerConfig,
  'corsOrigin' | 'rateLimitMaxCalls' | 'rateLimitPeriodSeconds' | 'adminApiKey'
> & {
  /** Backoff for transient store failures inside request handlers */
  retry?: RetryOptions;
};

/**
 * Create a configured Hono app with all routes and middleware.
 *
 * @param services - Engines from createServices
 * @param config - Optional partial config override (defaults from env)
 */
export function createApp(services: AppServices, config?: Partial<AppConfig>) {
  const env = getConfig();
  const resolved: AppConfig = {
    corsOrigin: config?.corsOrigin ?? env.corsOrigin,
    rateLimitMaxCalls: config?.rateLimitMaxCalls ?? env.rateLimitMaxCalls,
    rateLimitPeriodSeconds: config?.rateLimitPeriodSeconds ?? env.rateLimitPeriodSeconds,
    adminApiKey: config && 'adminApiKey' in config ? config.adminApiKey : env.adminApiKey,
    retry: config?.retry,
  };
  const { clock } = services;

  const app = new Hono();

  // ─── Global error handler ──────────────────────────────
  app.onError((err, c) => {
    if (err instanceof HTTPException) {
      return err.getResponse();
    }
    const body = errorBody(err);
    if (body.status >= 500) {
      log.error('Request failed', {
        path: new URL(c.req.url).pathname,
        status: body.status,
        error: getErrorMessage(err),
      });
    }
    return c.json(body, body.status);
  });

  app.notFound((c) => c.json({ error: 'Not found', status: 404 }, 404));

  // ─── Middleware on /api/* ──────────────────────────────
  app.use('/api/*', cors({ origin: resolved.corsOrigin }));
  app.use('/api/*', logger());
  app.use('/api/*', apiBodyLimit);

  // ─── Routes ────────────────────────────────────────────
  app.route('/api/health', healthRoutes(services.scheduler));
  app.route('/api/plans', plansRoutes(services.catalog));
  app.route(
    '/api/access',
    accessRoutes(services.access, {
      rateLimit: {
        maxCalls: resolved.rateLimitMaxCalls,
        periodSeconds: resolved.rateLimitPeriodSeconds,
      },
      clock,
      retry: resolved.retry,
    }),
  );
  app.route('/api/users', usersRoutes(services.access, { clock, retry: resolved.retry }));
  app.route('/api/payments', paymentsRoutes(services.reconciler, { clock }));

  // ─── Admin (mounted only when a key is configured) ─────
  if (resolved.adminApiKey) {
    app.route(
      '/api/admin',
      adminRoutes({
        adminApiKey: resolved.adminApiKey,
        store: services.store,
        access: services.access,
        scheduler: services.scheduler,
        clock,
        retry: resolved.retry,
      }),
    );
  }

  return app;
}

/**
 * Start the server as a standalone process.
 * Creates the database, runs migrations, starts the reset scheduler and
 * starts listening.
 */
export async function startServer() {
  const config = getConfig();
  validateConfig(config);

  // Create and initialize database
  // STORE_TIMEOUT_MS bounds SQLite lock waits
  const db = createDb({ databasePath: config.dbPath, busyTimeoutMs: config.storeTimeoutMs });
  runMigrations(db);
  const store = new TimedEntitlementStore(
    new SqliteEntitlementStore(db, { defaultDailyLimit: config.freeDailyLimit }),
    config.storeTimeoutMs,
  );

  const services = createServices(store, config);
  const app = createApp(services, config);

  log.info('QuotaPass server starting', {
    port: config.port,
    database: config.dbPath,
    corsOrigin: config.corsOrigin,
    resetTimezone: config.resetTimezone,
    resetCron: config.resetCron,
    freeDailyLimit: config.freeDailyLimit,
    plans: services.catalog.plans.map((p) => p.id),
    admin: config.adminApiKey ? 'enabled' : 'disabled',
  });

  services.scheduler.start();

  const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
    log.info(`QuotaPass server listening on http://localhost:${info.port}`);
  });

  const shutdown = (signal: string) => {
    log.info('Shutting down', { signal });
    services.scheduler.stop();
    server.close((err) => {
      if (err) {
        log.error('Error while closing server', { error: getErrorMessage(err) });
        process.exitCode = 1;
      }
    });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  return app;
}
