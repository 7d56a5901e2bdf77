/**
 * backend/src/modules/users/user.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the Users module.
 * - Prevents invalid payloads from reaching services.
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - Limits match the column sizes in migrations/0001_users.ts.
 * - Email only has to contain "@", the same rule as users_email_format_chk.
 */

import { z } from 'zod';

/** Largest value a Postgres `serial` column can hold. */
const MAX_USER_ID = 2_147_483_647;

export const userBodySchema = z.object({
  name: z
    .string({ required_error: 'Name is required' })
    .trim()
    .min(1, 'Name is required')
    .max(100, 'Name must be at most 100 characters'),
  email: z
    .string({ required_error: 'Email is required' })
    .trim()
    .min(1, 'Email is required')
    .max(150, 'Email must be at most 150 characters')
    .refine((v) => v.includes('@'), 'Invalid email address'),
  phone: z.string().trim().max(15, 'Phone must be at most 15 characters').nullish(),
});

export type UserBodyInput = z.infer<typeof userBodySchema>;

export const userIdParamsSchema = z.object({
  id: z.coerce.number().int().positive().max(MAX_USER_ID),
});

export type UserIdParams = z.infer<typeof userIdParamsSchema>;

export const searchQuerySchema = z.object({
  name: z.string().optional(),
  email: z.string().optional(),
});

export const recentQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(10),
  since: z.coerce.date().optional(),
});

export const phoneQuerySchema = z.object({
  phone: z.string().trim().min(1, 'Phone is required').max(15),
});
