/**
 * GET /api/health: liveness plus the next scheduled quota reset.
 */

import { Hono } from 'hono';
import type { QuotaResetScheduler } from '../lib/quota-reset-scheduler.js';

export const SERVER_VERSION = '0.1.0';

export function healthRoutes(scheduler: Pick<QuotaResetScheduler, 'nextRunAt'>) {
  const app = new Hono();

  app.get('/', (c) =>
    c.json({
      status: 'ok',
      version: SERVER_VERSION,
      nextQuotaResetAt: scheduler.nextRunAt?.toISOString() ?? null,
    }),
  );

  return app;
}
