/**
 * Request body schemas and the helper that applies them.
 */
import { z, type ZodError, type ZodType } from 'zod';
import type { Response } from 'express';
import { TRANSACTION_TYPES } from './db.js';

/** Positive integer amount in minor units */
const amount = z.number().int().positive().max(Number.MAX_SAFE_INTEGER);
const optionalText = z.string().nullish();

export const CredentialsSchema = z.object({
  username: z.string(),
  password: z.string(),
});

export const SignupSchema = CredentialsSchema.extend({
  confirmPassword: z.string(),
});

export const ChangePasswordSchema = z.object({
  currentPassword: z.string(),
  newPassword: z.string(),
  confirmPassword: z.string(),
});

export const VaultSchema = z.object({
  name: z.string(),
});

export const EntrySchema = z.object({
  vault: z.string(),
  amount,
  category: optionalText,
  description: optionalText,
  quantity: z.number().positive().nullish(),
  unit: optionalText,
  date: optionalText,
});

export const TransferSchema = z.object({
  fromVault: z.string(),
  toUser: z.string(),
  toVault: z.string(),
  amount,
  description: optionalText,
  date: optionalText,
});

export const LoanSchema = TransferSchema.extend({
  toVault: optionalText,
});

/** Bulk rows are checked by BulkValidator; the schema only fixes the shape. */
export const BulkRowSchema = z.object({
  rowNumber: z.number().int(),
  type: z.string().default(''),
  vault: z.string().default(''),
  amount: z.number().nullable().default(null),
  category: optionalText,
  description: z.string().default(''),
  quantity: z.number().nullish(),
  unit: optionalText,
  toUser: optionalText,
  toVault: optionalText,
  date: optionalText,
});

export const BulkSchema = z.object({
  rows: z.array(BulkRowSchema),
});

export const TransactionQuerySchema = z.object({
  vault: z.string().optional(),
  month: z
    .string()
    .regex(/^\d{4}-\d{2}$/, 'month must be YYYY-MM')
    .optional(),
  type: z.enum(TRANSACTION_TYPES).optional(),
});

export function formatZodErrors(error: ZodError): { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

/**
 * Parse `value` with `schema`. On failure the 400 response is sent and
 * undefined is returned.
 */
export function parseBody<T>(schema: ZodType<T, z.ZodTypeDef, unknown>, value: unknown, res: Response): T | undefined {
  const result = schema.safeParse(value);
  if (!result.success) {
    res.status(400).json({
      error: 'Request body validation failed',
      issues: formatZodErrors(result.error),
    });
    return undefined;
  }
  return result.data;
}
