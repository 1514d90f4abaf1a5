/**
 * @quotapass/core: Entitlement domain types
 */

// ─── Entitlement Record ────────────────────────────────────────────

/**
 * Durable per-user state. Timestamps are ISO 8601 UTC strings.
 */
export interface UserEntitlement {
  userId: string;
  /** Downloads consumed since `lastResetAt` */
  dailyUsed: number;
  /** Free-tier cap for this user */
  dailyLimit: number;
  /** Never moves backwards */
  lastResetAt: string;
  /** Null or in the past means no active subscription */
  subscriptionExpiresAt: string | null;
  /** Plan of the most recently applied purchase */
  currentPlanId: string | null;
  /** Idempotency ledger */
  processedPaymentIds: string[];
  createdAt: string;
  updatedAt: string;
}

/** Fields `save()` may change. `lastResetAt` is only ever advanced. */
export type EntitlementPatch = Partial<
  Pick<UserEntitlement, 'dailyUsed' | 'dailyLimit' | 'lastResetAt' | 'subscriptionExpiresAt' | 'currentPlanId'>
> & { userId: string };

// ─── Quota ─────────────────────────────────────────────────────────

export interface QuotaResult {
  allowed: boolean;
  remaining: number;
}

export interface QuotaSnapshot {
  dailyUsed: number;
  dailyLimit: number;
  remaining: number;
}

export interface QuotaResetResult {
  /** Calendar date (yyyy-MM-dd) of the boundary in the reference timezone */
  quotaDay: string;
  usersReset: number;
}

// ─── Access ────────────────────────────────────────────────────────

export type AccessReason = 'subscription' | 'quota_ok' | 'quota_exceeded' | 'file_too_large';

export interface AccessDecisionResult {
  allowed: boolean;
  reason: AccessReason;
  /** Free downloads left today; absent for subscribers */
  remaining?: number;
  /** Subscription expiry when `reason` is `subscription` */
  expiresAt?: string;
  maxFileSizeBytes: number;
}

export type Tier = 'free' | 'premium';

export interface EntitlementStatus {
  userId: string;
  tier: Tier;
  planId: string | null;
  subscriptionExpiresAt: string | null;
  /** Whole days left on the subscription, 0 when inactive */
  daysRemaining: number;
  quota: QuotaSnapshot;
  maxFileSizeBytes: number;
}

// ─── Plans ─────────────────────────────────────────────────────────

export interface Plan {
  id: string;
  name: string;
  description: string;
  durationDays: number;
  /** Price in minor units (paise for INR) */
  price: number;
  currency: string;
}

export interface DiscountCode {
  code: string;
  percentage: number;
  /** Cap on the discount in minor units */
  maxDiscount: number;
  /** Last valid calendar day (yyyy-MM-dd, inclusive, UTC) */
  validUntil: string;
  description: string;
}

export interface PlanCatalog {
  plans: Plan[];
  discounts: DiscountCode[];
}

// ─── Payments ──────────────────────────────────────────────────────

/** Lifecycle of one delivery of a payment confirmation */
export type PaymentState = 'RECEIVED' | 'VERIFIED' | 'APPLIED' | 'REJECTED';

export type PaymentOutcome = 'applied' | 'duplicate' | 'rejected';

export interface PaymentReconcileResult {
  paymentId: string;
  userId: string;
  state: Extract<PaymentState, 'APPLIED'>;
  outcome: Exclude<PaymentOutcome, 'rejected'>;
  /** New expiry; absent for duplicates */
  expiresAt?: string;
}

export interface PaymentAuditEntry {
  id: string;
  paymentId: string | null;
  userId: string | null;
  planId: string | null;
  amount: number | null;
  state: PaymentState;
  outcome: PaymentOutcome;
  reason: string | null;
  createdAt: string;
}

export interface QuotaResetLogEntry {
  id: string;
  quotaDay: string;
  asOf: string;
  usersReset: number;
}
