/**
 * Plan catalog and discount pricing.
 *
 * Prices are integer minor units; a discount is a percentage of the list
 * price, floored, and capped at `maxDiscount`.
 */

import { formatInTimeZone } from 'date-fns-tz';
import { planCatalogSchema } from './schemas.js';
import { ValidationError } from './errors.js';
import type { DiscountCode, Plan, PlanCatalog } from './types.js';

export const DEFAULT_PLAN_CATALOG: PlanCatalog = {
  plans: [
    {
      id: 'monthly',
      name: 'Monthly Premium',
      description: '30 days of unlimited downloads',
      durationDays: 30,
      price: 4900,
      currency: 'INR',
    },
    {
      id: 'quarterly',
      name: 'Quarterly Premium',
      description: '90 days of unlimited downloads',
      durationDays: 90,
      price: 12900,
      currency: 'INR',
    },
    {
      id: 'yearly',
      name: 'Yearly Premium',
      description: '365 days of unlimited downloads',
      durationDays: 365,
      price: 49900,
      currency: 'INR',
    },
  ],
  discounts: [],
};

/**
 * Validate an untrusted catalog (e.g. parsed from PLAN_CATALOG_PATH).
 */
export function parsePlanCatalog(raw: unknown): PlanCatalog {
  const result = planCatalogSchema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(
      'Invalid plan catalog',
      result.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
    );
  }
  return result.data;
}

export function findPlan(catalog: PlanCatalog, planId: string): Plan | undefined {
  return catalog.plans.find((p) => p.id === planId);
}

export function findDiscount(catalog: PlanCatalog, code: string): DiscountCode | undefined {
  const normalized = code.toUpperCase();
  return catalog.discounts.find((d) => d.code === normalized);
}

/** `validUntil` is inclusive and read as a UTC calendar day. */
export function isDiscountActive(discount: DiscountCode, now: Date): boolean {
  return formatInTimeZone(now, 'UTC', 'yyyy-MM-dd') <= discount.validUntil;
}

export function discountedPrice(plan: Plan, discount: DiscountCode): number {
  const off = Math.min(Math.floor((plan.price * discount.percentage) / 100), discount.maxDiscount);
  return plan.price - off;
}

/**
 * Amounts a confirmation for `plan` may carry. An unknown or expired code
 * leaves only the list price.
 */
export function acceptedAmounts(
  catalog: PlanCatalog,
  plan: Plan,
  discountCode: string | undefined,
  now: Date,
): number[] {
  const amounts = [plan.price];
  if (!discountCode) return amounts;

  const discount = findDiscount(catalog, discountCode);
  if (discount && isDiscountActive(discount, now)) {
    amounts.push(discountedPrice(plan, discount));
  }
  return amounts;
}
