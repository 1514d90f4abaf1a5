/**
 * Admin authentication: `Authorization: Bearer <ADMIN_API_KEY>`.
 *
 * Both sides are hashed before comparison so timingSafeEqual always sees
 * equal-length buffers.
 */

import { createHash, timingSafeEqual } from 'node:crypto';
import { createMiddleware } from 'hono/factory';
import { createLogger } from '../lib/logger.js';

const log = createLogger('AdminAuth');

function digest(value: string): Buffer {
  return createHash('sha256').update(value).digest();
}

function keysMatch(provided: string, expected: string): boolean {
  return timingSafeEqual(digest(provided), digest(expected));
}

export function adminAuthMiddleware(adminApiKey: string) {
  return createMiddleware(async (c, next) => {
    const authHeader = c.req.header('Authorization');
    if (!authHeader) {
      return c.json({ error: 'Authentication required', status: 401 }, 401);
    }

    const match = authHeader.match(/^Bearer\s+(\S+)$/);
    const token = match?.[1];
    if (!token) {
      return c.json({ error: 'Invalid Authorization header format. Expected: Bearer <key>', status: 401 }, 401);
    }

    if (!keysMatch(token, adminApiKey)) {
      log.warn('Rejected admin request', { path: new URL(c.req.url).pathname });
      return c.json({ error: 'Invalid admin key', status: 401 }, 401);
    }

    return next();
  });
}
