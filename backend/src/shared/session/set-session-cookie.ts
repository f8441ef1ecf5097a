/**
 * backend/src/shared/session/set-session-cookie.ts
 *
 * WHY:
 * - Login sets and logout clears the same cookie with the same flags.
 *   Keeping both here means HttpOnly / SameSite=Strict / Secure (prod) can never drift.
 *
 * RULES:
 * - No business logic here.
 * - Receives isProduction from the caller (injected at construction time in the controller).
 */

import type { FastifyReply } from 'fastify';
import { SESSION_COOKIE_NAME } from './session.types';

function cookieAttributes(isProduction: boolean): string[] {
  const parts = ['Path=/', 'HttpOnly', 'SameSite=Strict'];
  if (isProduction) parts.push('Secure');
  return parts;
}

export function setSessionCookie(
  reply: FastifyReply,
  sessionId: string,
  isProduction: boolean,
): void {
  reply.header(
    'Set-Cookie',
    [`${SESSION_COOKIE_NAME}=${sessionId}`, ...cookieAttributes(isProduction)].join('; '),
  );
}

export function clearSessionCookie(reply: FastifyReply, isProduction: boolean): void {
  // Max-Age=0 instructs the browser to delete the cookie immediately.
  reply.header(
    'Set-Cookie',
    [`${SESSION_COOKIE_NAME}=`, ...cookieAttributes(isProduction), 'Max-Age=0'].join('; '),
  );
}
