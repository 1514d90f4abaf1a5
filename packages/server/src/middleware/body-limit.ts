/**
 * Global body limit for /api/*. Webhook events and access requests are a
 * few hundred bytes; anything near the limit is not a client of ours.
 */

import { bodyLimit } from 'hono/body-limit';

export const API_BODY_LIMIT_BYTES = 64 * 1024;

export const apiBodyLimit = bodyLimit({
  maxSize: API_BODY_LIMIT_BYTES,
  onError: (c) => {
    return c.json(
      { error: 'Request body too large', status: 413, maxSize: '64KB' },
      413,
    );
  },
});
