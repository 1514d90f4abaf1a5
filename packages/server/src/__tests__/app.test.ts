import { describe, it, expect } from 'vitest';
import { DEFAULT_PLAN_CATALOG } from '@quotapass/core';
import { createTestApp } from './test-helpers.js';

describe('createApp', () => {
  it('GET /api/health reports ok', async () => {
    const { app } = createTestApp();
    const res = await app.request('/api/health');
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ok', version: '0.1.0', nextQuotaResetAt: null });
  });

  it('GET /api/health shows the next reset once the scheduler runs', async () => {
    const { app, services } = createTestApp();
    services.scheduler.start();
    try {
      const body = await (await app.request('/api/health')).json();
      expect(body.nextQuotaResetAt).toBe('2025-03-11T00:00:00.000Z');
    } finally {
      services.scheduler.stop();
    }
  });

  it('GET /api/plans lists the catalog', async () => {
    const { app } = createTestApp();
    const res = await app.request('/api/plans');
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ plans: DEFAULT_PLAN_CATALOG.plans });
  });

  it('unknown API paths return JSON 404', async () => {
    const { app } = createTestApp();
    const res = await app.request('/api/nope');
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Not found', status: 404 });
  });
});
