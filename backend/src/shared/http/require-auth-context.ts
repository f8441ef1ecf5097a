/**
 * backend/src/shared/http/require-auth-context.ts
 *
 * WHY:
 * - Controllers must not duplicate "require session" logic.
 *
 * RULES:
 * - HTTP-only helper (may depend on Fastify request typing).
 * - Must NOT touch DB or services; the session middleware already resolved the cookie.
 * - Missing or unknown session → 403 (this API never answers 401 for a cookie problem;
 *   401 is reserved for bad credentials on POST /sessions).
 */

import type { FastifyRequest } from 'fastify';
import { AppError } from './errors';
import type { UserId } from '../../modules/users';

export type RequiredAuthContext = Readonly<{
  sessionId: string;
  userId: UserId;
  email: string;
}>;

export function requireSession(req: FastifyRequest): RequiredAuthContext {
  const ctx = req.authContext;
  if (!ctx) throw AppError.forbidden();

  if (!ctx.sessionId || ctx.userId === null || ctx.email === null) {
    throw AppError.forbidden();
  }

  return {
    sessionId: ctx.sessionId,
    userId: ctx.userId,
    email: ctx.email,
  };
}
