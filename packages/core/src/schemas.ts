/**
 * @quotapass/core: Zod Validation Schemas
 *
 * Every inbound payload is parsed here before business logic sees it.
 */
import { z } from 'zod';

const isoDaySchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected yyyy-MM-dd');

/** Fields joined with `|` into the signed payload may not contain it. */
const signedFieldSchema = z.string().min(1).refine((v) => !v.includes('|'), "Must not contain '|'");

/**
 * Chat platforms hand out numeric or string ids; both normalize to a string.
 */
export const userIdSchema = z
  .union([signedFieldSchema, z.number().int().nonnegative()])
  .transform((v) => String(v));

/**
 * Payment-processor confirmation delivered to the webhook.
 */
export const paymentEventSchema = z.object({
  paymentId: signedFieldSchema,
  userId: userIdSchema,
  planId: signedFieldSchema,
  /** Minor units */
  amount: z.number().int().nonnegative(),
  currency: z.string().length(3).toUpperCase().default('INR'),
  /** Signed as sent; matched against the catalog case-insensitively */
  discountCode: signedFieldSchema.optional(),
  signature: z.string().min(1),
});

export const planSchema = z.object({
  id: signedFieldSchema,
  name: z.string().min(1),
  description: z.string().default(''),
  durationDays: z.number().int().positive(),
  price: z.number().int().nonnegative(),
  currency: z.string().length(3).toUpperCase().default('INR'),
});

export const discountCodeSchema = z.object({
  code: z.string().min(1).toUpperCase(),
  percentage: z.number().gt(0).max(100),
  maxDiscount: z.number().int().nonnegative(),
  validUntil: isoDaySchema,
  description: z.string().default(''),
});

export const planCatalogSchema = z
  .object({
    plans: z.array(planSchema).min(1),
    discounts: z.array(discountCodeSchema).default([]),
  })
  .refine(
    (c) => new Set(c.plans.map((p) => p.id)).size === c.plans.length,
    { message: 'Plan ids must be unique', path: ['plans'] },
  );

export const downloadRequestSchema = z.object({
  fileSizeBytes: z.number().int().nonnegative().optional(),
});

export const updateDailyLimitSchema = z.object({
  dailyLimit: z.number().int().nonnegative(),
});

export type PaymentEvent = z.infer<typeof paymentEventSchema>;
export type PaymentEventInput = z.input<typeof paymentEventSchema>;
export type DownloadRequestInput = z.infer<typeof downloadRequestSchema>;
export type UpdateDailyLimitInput = z.infer<typeof updateDailyLimitSchema>;
