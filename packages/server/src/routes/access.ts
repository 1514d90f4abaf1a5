/**
 * Access REST Endpoint
 *
 * POST /api/access/:userId/download: ask whether a download may start.
 *
 * Body is optional: `{ fileSizeBytes? }`. The decision is returned with 200
 * whether or not access is granted; 429 means the caller is asking too often,
 * 503 means the store could not answer after retries.
 */

import { Hono } from 'hono';
import { downloadRequestSchema } from '@quotapass/core';
import type { AccessDecision } from '../services/access-decision.js';
import { userRateLimit, type UserRateLimitOptions } from '../middleware/rate-limit.js';
import { parseJsonBody } from '../middleware/validation.js';
import { withRetry, type RetryOptions } from '../lib/db-resilience.js';
import { systemClock, type Clock } from '../lib/clock.js';

export interface AccessRoutesOptions {
  rateLimit: UserRateLimitOptions;
  clock?: Clock;
  retry?: RetryOptions;
}

export function accessRoutes(access: AccessDecision, options: AccessRoutesOptions) {
  const app = new Hono();
  const clock = options.clock ?? systemClock;

  app.post('/:userId/download', userRateLimit(options.rateLimit), async (c) => {
    const userId = c.req.param('userId');
    const body = await parseJsonBody(c, downloadRequestSchema, { allowEmpty: true });
    if (!body.success) return body.response;

    const decision = await withRetry(
      () => access.canDownload(userId, clock.now(), body.data),
      options.retry,
    );
    return c.json(decision);
  });

  return app;
}
