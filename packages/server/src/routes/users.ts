/**
 * User status endpoint
 *
 * GET /api/users/:userId/status: tier, expiry, days left and today's quota.
 * Reading status never consumes quota.
 */

import { Hono } from 'hono';
import type { AccessDecision } from '../services/access-decision.js';
import { withRetry, type RetryOptions } from '../lib/db-resilience.js';
import { systemClock, type Clock } from '../lib/clock.js';

export interface UsersRoutesOptions {
  clock?: Clock;
  retry?: RetryOptions;
}

export function usersRoutes(access: AccessDecision, options: UsersRoutesOptions = {}) {
  const app = new Hono();
  const clock = options.clock ?? systemClock;

  app.get('/:userId/status', async (c) => {
    const userId = c.req.param('userId');
    const status = await withRetry(() => access.getStatus(userId, clock.now()), options.retry);
    return c.json(status);
  });

  return app;
}
