/**
 * Request body parsing with Zod.
 *
 * Handlers call parseJsonBody and return `result.response` on failure; the
 * 400 shape is `{ error, status, details? }` everywhere.
 */

import type { Context } from 'hono';
import type { ZodError, ZodType, ZodTypeDef } from 'zod';
import type { ValidationIssue } from '@quotapass/core';

export type BodyResult<T> =
  | { success: true; data: T }
  | { success: false; response: Response };

export interface ParseBodyOptions {
  /** Treat an empty body as `{}` (for endpoints whose fields are all optional) */
  allowEmpty?: boolean;
}

/**
 * Format Zod validation errors into a consistent API response shape.
 */
export function formatZodErrors(error: ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

/**
 * Read the raw JSON body without validating it.
 */
export async function readJsonBody(c: Context, options: ParseBodyOptions = {}): Promise<BodyResult<unknown>> {
  const text = await c.req.text();
  if (text.trim() === '') {
    if (options.allowEmpty) return { success: true, data: {} };
    return { success: false, response: c.json({ error: 'Invalid JSON body', status: 400 }, 400) };
  }

  try {
    const data: unknown = JSON.parse(text);
    return { success: true, data };
  } catch {
    return { success: false, response: c.json({ error: 'Invalid JSON body', status: 400 }, 400) };
  }
}

export async function parseJsonBody<T>(
  c: Context,
  schema: ZodType<T, ZodTypeDef, unknown>,
  options: ParseBodyOptions = {},
): Promise<BodyResult<T>> {
  const raw = await readJsonBody(c, options);
  if (!raw.success) return raw;

  const result = schema.safeParse(raw.data);
  if (!result.success) {
    return {
      success: false,
      response: c.json(
        { error: 'Validation failed', status: 400, details: formatZodErrors(result.error) },
        400,
      ),
    };
  }
  return { success: true, data: result.data };
}
