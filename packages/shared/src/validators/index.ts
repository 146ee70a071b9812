import { z } from 'zod';

export * from './devices';

// ============================================
// Query Validators
// ============================================

export const monthSchema = z
  .string()
  .regex(/^\d{4}-(0[1-9]|1[0-2])$/, 'month must be formatted YYYY-MM');

export const dateSchema = z
  .string()
  .regex(/^\d{4}-(0[1-9]|1[0-2])-(0[1-9]|[12]\d|3[01])$/, 'date must be formatted YYYY-MM-DD');

export const deviceParamSchema = z.object({
  name: z.string().min(1).max(100)
});

export const monthQuerySchema = z.object({
  month: monthSchema.optional()
});
