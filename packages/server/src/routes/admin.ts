/**
 * Admin REST Endpoints (Bearer ADMIN_API_KEY)
 *
 * GET  /api/admin/users/:userId: raw record, status and payment audit
 * PUT  /api/admin/users/:userId/daily-limit: per-user tier override
 * POST /api/admin/quota/reset: run the daily reset now
 * GET  /api/admin/quota/resets: recent reset runs
 */

import { Hono } from 'hono';
import { updateDailyLimitSchema } from '@quotapass/core';
import type { EntitlementStore } from '../db/entitlement-store.js';
import type { AccessDecision } from '../services/access-decision.js';
import type { QuotaResetScheduler } from '../lib/quota-reset-scheduler.js';
import { adminAuthMiddleware } from '../middleware/admin-auth.js';
import { parseJsonBody } from '../middleware/validation.js';
import { withRetry, type RetryOptions } from '../lib/db-resilience.js';
import { systemClock, type Clock } from '../lib/clock.js';
import { createLogger } from '../lib/logger.js';

const log = createLogger('AdminRoutes');

export interface AdminRoutesDeps {
  adminApiKey: string;
  store: EntitlementStore;
  access: AccessDecision;
  scheduler: Pick<QuotaResetScheduler, 'runOnce'>;
  clock?: Clock;
  retry?: RetryOptions;
}

function parseLimit(raw: string | undefined, fallback: number, max: number): number {
  const parsed = parseInt(raw ?? '', 10);
  if (isNaN(parsed) || parsed < 1) return fallback;
  return Math.min(parsed, max);
}

export function adminRoutes(deps: AdminRoutesDeps) {
  const app = new Hono();
  const clock = deps.clock ?? systemClock;

  app.use('*', adminAuthMiddleware(deps.adminApiKey));

  app.get('/users/:userId', async (c) => {
    const userId = c.req.param('userId');
    const limit = parseLimit(c.req.query('limit'), 50, 500);
    const [entitlement, status, payments] = await withRetry(
      () =>
        Promise.all([
          deps.store.get(userId),
          deps.access.getStatus(userId, clock.now()),
          deps.store.listPaymentAudit(userId, limit),
        ]),
      deps.retry,
    );
    return c.json({ entitlement, status, payments });
  });

  app.put('/users/:userId/daily-limit', async (c) => {
    const userId = c.req.param('userId');
    const body = await parseJsonBody(c, updateDailyLimitSchema);
    if (!body.success) return body.response;

    const entitlement = await withRetry(
      () => deps.store.save({ userId, dailyLimit: body.data.dailyLimit }),
      deps.retry,
    );
    log.info('Daily limit updated', { userId, dailyLimit: entitlement.dailyLimit });
    return c.json({ entitlement });
  });

  app.post('/quota/reset', async (c) => {
    const result = await deps.scheduler.runOnce();
    return c.json(result);
  });

  app.get('/quota/resets', async (c) => {
    const limit = parseLimit(c.req.query('limit'), 30, 365);
    const resets = await withRetry(() => deps.store.listQuotaResets(limit), deps.retry);
    return c.json({ resets });
  });

  return app;
}
