/**
 * Per-user throttle for the access route, on hono-rate-limiter's in-memory
 * store. Keyed by the `:userId` path param, not the client IP: every chat
 * user reaches us through the same transport.
 *
 * @module middleware/rate-limit
 */

import { rateLimiter } from 'hono-rate-limiter';
import { createLogger } from '../lib/logger.js';

const log = createLogger('RateLimit');

export interface UserRateLimitOptions {
  /** Calls allowed per window */
  maxCalls: number;
  /** Window length in seconds */
  periodSeconds: number;
}

export function userRateLimit(options: UserRateLimitOptions) {
  return rateLimiter({
    windowMs: options.periodSeconds * 1000,
    limit: options.maxCalls,
    standardHeaders: 'draft-7',
    keyGenerator: (c) => `user:${c.req.param('userId') ?? 'unknown'}`,
    handler: (c) => {
      log.warn('User rate limit exceeded', {
        userId: c.req.param('userId'),
        route: new URL(c.req.url).pathname,
      });
      return c.json(
        { error: 'Too Many Requests', status: 429, retryAfterSeconds: options.periodSeconds },
        429,
      );
    },
  });
}
