/**
 * GET /api/plans: purchasable plans, prices in minor units.
 *
 * Discount codes are not listed.
 */

import { Hono } from 'hono';
import type { PlanCatalog } from '@quotapass/core';

export function plansRoutes(catalog: PlanCatalog) {
  const app = new Hono();

  app.get('/', (c) => c.json({ plans: catalog.plans }));

  return app;
}
