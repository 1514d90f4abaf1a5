/**
 * Payment webhook
 *
 * POST /api/payments/webhook: processor confirmation of a completed payment.
 *
 * The event carries its own HMAC signature; no API key is involved. Both the
 * first delivery and any duplicate answer 200 so the processor stops
 * retrying. Rejections map to 400 (malformed) or 401 (failed verification)
 * through the app error handler; transient store failures map to 503 so the
 * processor retries later.
 */

import { Hono } from 'hono';
import type { PaymentReconciler } from '../services/payment-reconciler.js';
import { readJsonBody } from '../middleware/validation.js';
import { systemClock, type Clock } from '../lib/clock.js';

export interface PaymentsRoutesOptions {
  clock?: Clock;
}

export function paymentsRoutes(reconciler: PaymentReconciler, options: PaymentsRoutesOptions = {}) {
  const app = new Hono();
  const clock = options.clock ?? systemClock;

  app.post('/webhook', async (c) => {
    const raw = await readJsonBody(c);
    if (!raw.success) return raw.response;

    const result = await reconciler.onPaymentConfirmed(raw.data, clock.now());
    return c.json({
      received: true,
      outcome: result.outcome,
      paymentId: result.paymentId,
      ...(result.expiresAt ? { expiresAt: result.expiresAt } : {}),
    });
  });

  return app;
}
