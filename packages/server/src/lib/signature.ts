/**
 * Payment event signatures.
 *
 * The processor signs `paymentId|userId|planId|amount|discountCode` (empty
 * string when there is no code) with HMAC-SHA256 over the shared secret and
 * sends the lowercase hex digest.
 */

import { createHmac, timingSafeEqual } from 'node:crypto';

export interface SignedPaymentFields {
  paymentId: string;
  userId: string | number;
  planId: string;
  amount: number;
  discountCode?: string;
}

export function paymentSignaturePayload(fields: SignedPaymentFields): string {
  return [
    fields.paymentId,
    String(fields.userId),
    fields.planId,
    String(fields.amount),
    fields.discountCode ?? '',
  ].join('|');
}

export function signPaymentEvent(fields: SignedPaymentFields, secret: string): string {
  return createHmac('sha256', secret).update(paymentSignaturePayload(fields)).digest('hex');
}

/**
 * Verify HMAC-SHA256 signature using timing-safe comparison.
 */
export function verifyWebhookSignature(
  payload: string,
  signature: string,
  secret: string,
): boolean {
  if (!signature || !secret) return false;

  const expected = createHmac('sha256', secret).update(payload).digest('hex');

  // Ensure buffers are equal length for timingSafeEqual
  const sigBuf = Buffer.from(signature.toLowerCase(), 'utf8');
  const expBuf = Buffer.from(expected, 'utf8');
  if (sigBuf.length !== expBuf.length) return false;

  return timingSafeEqual(sigBuf, expBuf);
}
