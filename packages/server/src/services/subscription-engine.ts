/**
 * Subscription Engine: time-boxed premium access.
 *
 * Purchases stack: the new expiry is measured from the later of `now` and
 * the current expiry, so renewing early loses nothing.
 */

import { DAY_MS } from '@quotapass/core';
import type { EntitlementStore } from '../db/entitlement-store.js';

export class SubscriptionEngine {
  constructor(private readonly store: EntitlementStore) {}

  async getExpiry(userId: string): Promise<Date | null> {
    const record = await this.store.get(userId);
    return record.subscriptionExpiresAt ? new Date(record.subscriptionExpiresAt) : null;
  }

  async isActive(userId: string, now: Date): Promise<boolean> {
    const expiry = await this.getExpiry(userId);
    return expiry !== null && now.getTime() < expiry.getTime();
  }

  async applyPurchase(
    userId: string,
    planDurationDays: number,
    now: Date,
    planId?: string,
  ): Promise<Date> {
    return this.store.extendSubscription(userId, stackFrom(now, planDurationDays), planId);
  }

  /**
   * applyPurchase guarded by the payment ledger: the extension is written
   * together with the `paymentId` entry, or not at all. Returns `null` for
   * a payment that was already applied.
   */
  async applyPurchaseOnce(
    userId: string,
    paymentId: string,
    planDurationDays: number,
    now: Date,
    planId?: string,
  ): Promise<Date | null> {
    return this.store.applyPaymentOnce(userId, paymentId, stackFrom(now, planDurationDays), planId);
  }
}

function stackFrom(now: Date, planDurationDays: number): (current: Date | null) => Date {
  if (!Number.isInteger(planDurationDays) || planDurationDays <= 0) {
    throw new RangeError(`planDurationDays must be a positive integer, got ${planDurationDays}`);
  }
  return (current) => {
    const base = Math.max(now.getTime(), current?.getTime() ?? now.getTime());
    return new Date(base + planDurationDays * DAY_MS);
  };
}
