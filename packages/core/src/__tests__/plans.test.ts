import { describe, it, expect } from 'vitest';
import {
  DEFAULT_PLAN_CATALOG,
  acceptedAmounts,
  discountedPrice,
  findDiscount,
  findPlan,
  isDiscountActive,
  parsePlanCatalog,
} from '../plans.js';
import { ValidationError } from '../errors.js';
import type { DiscountCode, Plan, PlanCatalog } from '../types.js';

const monthly: Plan = {
  id: 'monthly',
  name: 'Monthly Premium',
  description: '',
  durationDays: 30,
  price: 4900,
  currency: 'INR',
};

const save20: DiscountCode = {
  code: 'SAVE20',
  percentage: 20,
  maxDiscount: 500,
  validUntil: '2025-03-31',
  description: '',
};

const catalog: PlanCatalog = { plans: [monthly], discounts: [save20] };

describe('DEFAULT_PLAN_CATALOG', () => {
  it('offers monthly, quarterly and yearly plans in paise', () => {
    expect(DEFAULT_PLAN_CATALOG.plans.map((p) => [p.id, p.durationDays, p.price])).toEqual([
      ['monthly', 30, 4900],
      ['quarterly', 90, 12900],
      ['yearly', 365, 49900],
    ]);
  });
});

describe('findPlan / findDiscount', () => {
  it('looks up plans by id', () => {
    expect(findPlan(catalog, 'monthly')).toBe(monthly);
    expect(findPlan(catalog, 'weekly')).toBeUndefined();
  });

  it('matches discount codes case-insensitively', () => {
    expect(findDiscount(catalog, 'save20')).toBe(save20);
    expect(findDiscount(catalog, 'SAVE30')).toBeUndefined();
  });
});

describe('discountedPrice', () => {
  it('caps the reduction at maxDiscount', () => {
    // 20% of 4900 is 980, capped at 500
    expect(discountedPrice(monthly, save20)).toBe(4400);
  });

  it('floors fractional reductions', () => {
    expect(discountedPrice({ ...monthly, price: 999 }, { ...save20, percentage: 15, maxDiscount: 10_000 })).toBe(850);
  });
});

describe('isDiscountActive', () => {
  it('is inclusive of the last valid day', () => {
    expect(isDiscountActive(save20, new Date('2025-03-31T23:59:59.000Z'))).toBe(true);
    expect(isDiscountActive(save20, new Date('2025-04-01T00:00:00.000Z'))).toBe(false);
  });
});

describe('acceptedAmounts', () => {
  const now = new Date('2025-03-10T08:00:00.000Z');

  it('accepts only the list price without a code', () => {
    expect(acceptedAmounts(catalog, monthly, undefined, now)).toEqual([4900]);
  });

  it('adds the discounted price for an active code', () => {
    expect(acceptedAmounts(catalog, monthly, 'save20', now)).toEqual([4900, 4400]);
  });

  it('ignores unknown and expired codes', () => {
    expect(acceptedAmounts(catalog, monthly, 'NOPE', now)).toEqual([4900]);
    expect(acceptedAmounts(catalog, monthly, 'SAVE20', new Date('2025-04-02T00:00:00.000Z'))).toEqual([4900]);
  });
});

describe('parsePlanCatalog', () => {
  it('normalizes discount codes to upper case', () => {
    const parsed = parsePlanCatalog({
      plans: [{ id: 'weekly', name: 'Weekly', durationDays: 7, price: 1500 }],
      discounts: [{ code: 'launch', percentage: 50, maxDiscount: 1000, validUntil: '2025-12-31' }],
    });
    expect(parsed.discounts[0]?.code).toBe('LAUNCH');
  });

  it('throws ValidationError with issue paths', () => {
    let caught: unknown;
    try {
      parsePlanCatalog({ plans: [{ id: 'weekly', name: 'Weekly', durationDays: 0, price: 1500 }] });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    if (caught instanceof ValidationError) {
      expect(caught.issues).toEqual([
        { path: 'plans.0.durationDays', message: 'Number must be greater than 0' },
      ]);
    }
  });
});
