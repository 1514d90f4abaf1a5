/**
 * Access Decision: the single checkpoint a download handler calls before
 * doing any work.
 */

import {
  DAY_MS,
  MAX_FREE_FILE_SIZE,
  MAX_PREMIUM_FILE_SIZE,
  type AccessDecisionResult,
  type EntitlementStatus,
} from '@quotapass/core';
import type { QuotaEngine } from './quota-engine.js';
import type { SubscriptionEngine } from './subscription-engine.js';
import type { EntitlementStore } from '../db/entitlement-store.js';

export interface FileSizeLimits {
  free: number;
  premium: number;
}

export interface AccessDecisionDeps {
  store: EntitlementStore;
  quota: QuotaEngine;
  subscriptions: SubscriptionEngine;
  fileSizeLimits?: FileSizeLimits;
}

export interface DownloadRequest {
  /** Size reported by the file host, when known */
  fileSizeBytes?: number;
}

export class AccessDecision {
  private readonly limits: FileSizeLimits;

  constructor(private readonly deps: AccessDecisionDeps) {
    this.limits = deps.fileSizeLimits ?? { free: MAX_FREE_FILE_SIZE, premium: MAX_PREMIUM_FILE_SIZE };
  }

  /**
   * Subscribers pass without touching their quota. Free users spend one
   * unit, unless the file is over the free cap, which is refused before
   * anything is consumed.
   */
  async canDownload(userId: string, now: Date, request: DownloadRequest = {}): Promise<AccessDecisionResult> {
    const expiry = await this.deps.subscriptions.getExpiry(userId);

    if (expiry !== null && now.getTime() < expiry.getTime()) {
      if (exceeds(request.fileSizeBytes, this.limits.premium)) {
        return { allowed: false, reason: 'file_too_large', maxFileSizeBytes: this.limits.premium };
      }
      return {
        allowed: true,
        reason: 'subscription',
        expiresAt: expiry.toISOString(),
        maxFileSizeBytes: this.limits.premium,
      };
    }

    if (exceeds(request.fileSizeBytes, this.limits.free)) {
      return { allowed: false, reason: 'file_too_large', maxFileSizeBytes: this.limits.free };
    }

    const { allowed, remaining } = await this.deps.quota.checkAndConsume(userId, now);
    return {
      allowed,
      reason: allowed ? 'quota_ok' : 'quota_exceeded',
      remaining,
      maxFileSizeBytes: this.limits.free,
    };
  }

  async getStatus(userId: string, now: Date): Promise<EntitlementStatus> {
    const record = await this.deps.store.get(userId);
    const quota = await this.deps.quota.peek(userId, now);

    const expiryMs = record.subscriptionExpiresAt ? Date.parse(record.subscriptionExpiresAt) : null;
    const active = expiryMs !== null && now.getTime() < expiryMs;

    return {
      userId,
      tier: active ? 'premium' : 'free',
      planId: active ? record.currentPlanId : null,
      subscriptionExpiresAt: record.subscriptionExpiresAt,
      daysRemaining: active ? Math.floor((expiryMs - now.getTime()) / DAY_MS) : 0,
      quota,
      maxFileSizeBytes: active ? this.limits.premium : this.limits.free,
    };
  }
}

function exceeds(size: number | undefined, limit: number): boolean {
  return size !== undefined && size > limit;
}
