import { describe, it, expect } from 'vitest';
import { Hono } from 'hono';
import { z } from 'zod';
import { formatZodErrors, parseJsonBody, readJsonBody } from '../validation.js';
import { apiBodyLimit } from '../body-limit.js';

const testSchema = z.object({
  name: z.string().min(1),
  count: z.number().int().min(0).optional(),
});

function createValidationApp() {
  const app = new Hono();
  app.use('/api/*', apiBodyLimit);

  app.post('/api/strict', async (c) => {
    const body = await parseJsonBody(c, testSchema);
    if (!body.success) return body.response;
    return c.json({ ok: true, name: body.data.name });
  });

  app.post('/api/optional', async (c) => {
    const body = await parseJsonBody(c, testSchema.partial(), { allowEmpty: true });
    if (!body.success) return body.response;
    return c.json({ ok: true, body: body.data });
  });

  app.post('/api/raw', async (c) => {
    const body = await readJsonBody(c);
    if (!body.success) return body.response;
    return c.json({ raw: body.data });
  });

  return app;
}

function post(path: string, body: string) {
  return createValidationApp().request(path, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body,
  });
}

describe('formatZodErrors', () => {
  it('joins issue paths with dots', () => {
    const result = z.object({ a: z.object({ b: z.number() }) }).safeParse({ a: { b: 'x' } });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodErrors(result.error)).toEqual([{ path: 'a.b', message: 'Expected number, received string' }]);
    }
  });
});

describe('parseJsonBody', () => {
  it('passes a valid body through', async () => {
    const res = await post('/api/strict', JSON.stringify({ name: 'a' }));
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ ok: true, name: 'a' });
  });

  it('returns 400 with details for an invalid body', async () => {
    const res = await post('/api/strict', JSON.stringify({ name: '', count: -1 }));
    expect(res.status).toBe(400);
    const body = await res.json();
    expect(body.error).toBe('Validation failed');
    expect(body.details.map((d: { path: string }) => d.path)).toEqual(['name', 'count']);
  });

  it('returns 400 for malformed JSON', async () => {
    const res = await post('/api/strict', '{ nope');
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Invalid JSON body', status: 400 });
  });

  it('rejects an empty body unless allowed', async () => {
    expect((await post('/api/strict', '')).status).toBe(400);

    const res = await post('/api/optional', '');
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ ok: true, body: {} });
  });
});

describe('readJsonBody', () => {
  it('returns any JSON value unvalidated', async () => {
    const res = await post('/api/raw', '[1,2]');
    expect(await res.json()).toEqual({ raw: [1, 2] });
  });
});

describe('apiBodyLimit', () => {
  it('rejects bodies over 64KB with 413', async () => {
    const res = await post('/api/raw', JSON.stringify({ pad: 'x'.repeat(70 * 1024) }));
    expect(res.status).toBe(413);
    expect((await res.json()).error).toBe('Request body too large');
  });
});
