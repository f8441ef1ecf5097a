/**
 * src/modules/auth/auth.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the Auth module.
 * - Bodies arrive form-encoded or as JSON; both parse to plain string fields.
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - Field names match the wire format (snake_case for reset fields).
 * - Email is an opaque non-empty string; its syntax is never checked.
 */

import { z } from 'zod';

export const registerSchema = z.object({
  email: z.string().min(1, 'Email is required'),
  password: z.string().min(1, 'Password is required'),
});

export type RegisterInput = z.infer<typeof registerSchema>;

export const loginSchema = z.object({
  email: z.string().min(1, 'Email is required'),
  password: z.string().min(1, 'Password is required'),
});

export type LoginInput = z.infer<typeof loginSchema>;

export const resetPasswordRequestSchema = z.object({
  email: z.string().min(1, 'Email is required'),
});

export type ResetPasswordRequestInput = z.infer<typeof resetPasswordRequestSchema>;

export const updatePasswordSchema = z.object({
  email: z.string().min(1, 'Email is required'),
  reset_token: z.string().min(1, 'Reset token is required'),
  new_password: z.string().min(1, 'Password is required'),
});

export type UpdatePasswordInput = z.infer<typeof updatePasswordSchema>;
