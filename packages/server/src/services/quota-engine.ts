/**
 * Quota Engine: free-tier daily usage.
 *
 * The boundary is midnight of the current quota day in the reference
 * timezone, shared by checkAndConsume and resetAll, never "24 hours since
 * last use".
 */

import {
  isStaleReset,
  quotaBoundary,
  quotaDay,
  type QuotaResetResult,
  type QuotaResult,
  type QuotaSnapshot,
} from '@quotapass/core';
import type { EntitlementStore } from '../db/entitlement-store.js';
import { createLogger } from '../lib/logger.js';

const log = createLogger('QuotaEngine');

export interface QuotaEngineOptions {
  /** IANA reference zone for the daily boundary */
  timeZone: string;
}

export class QuotaEngine {
  constructor(
    private readonly store: EntitlementStore,
    private readonly options: QuotaEngineOptions,
  ) {}

  get timeZone(): string {
    return this.options.timeZone;
  }

  /**
   * Consume one download if the user has quota left today. A denied call
   * leaves the record untouched apart from a pending daily reset.
   */
  async checkAndConsume(userId: string, now: Date): Promise<QuotaResult> {
    const { consumed, record } = await this.store.consumeQuota(userId, {
      boundary: quotaBoundary(now, this.options.timeZone),
      now,
    });

    if (!consumed) {
      return { allowed: false, remaining: 0 };
    }
    return { allowed: true, remaining: Math.max(record.dailyLimit - record.dailyUsed, 0) };
  }

  /**
   * Usage as checkAndConsume would see it at `now`, without writing.
   */
  async peek(userId: string, now: Date): Promise<QuotaSnapshot> {
    const record = await this.store.get(userId);
    const dailyUsed = isStaleReset(new Date(record.lastResetAt), now, this.options.timeZone)
      ? 0
      : record.dailyUsed;
    return {
      dailyUsed,
      dailyLimit: record.dailyLimit,
      remaining: Math.max(record.dailyLimit - dailyUsed, 0),
    };
  }

  /**
   * Reset every counter from an earlier quota day. Records already reset
   * for the current boundary are left alone, so repeated runs are no-ops.
   */
  async resetAll(asOf: Date): Promise<QuotaResetResult> {
    const boundary = quotaBoundary(asOf, this.options.timeZone);
    const day = quotaDay(asOf, this.options.timeZone);

    const usersReset = await this.store.resetAllBefore(boundary, asOf);
    await this.store.recordQuotaReset({ quotaDay: day, asOf: asOf.toISOString(), usersReset });

    log.info('Daily quota reset complete', { quotaDay: day, usersReset });
    return { quotaDay: day, usersReset };
  }
}
