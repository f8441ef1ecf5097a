/**
 * backend/src/shared/session/session.middleware.ts
 *
 * WHY:
 * - Reads the session cookie on every request.
 * - If it resolves to a user, populates req.authContext (userId, email, sessionId).
 * - Does NOT throw if no session; endpoints decide if auth is required.
 *
 * RULES:
 * - Runs AFTER requestContext and authContext hooks (needs both to exist).
 * - Best-effort: missing/unknown cookie leaves authContext at its null stub.
 * - Depends on a narrow resolver, not on AuthService as a whole.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { User } from '../../modules/users';
import { SESSION_COOKIE_NAME } from './session.types';

export type SessionResolver = {
  resolveSession(sessionId: string | null | undefined): Promise<User | null>;
};

/**
 * Parses a raw Cookie header into key-value pairs.
 * Handles the standard format: "key1=value1; key2=value2"
 */
export function parseCookies(raw: string | undefined): Record<string, string> {
  if (!raw) return {};

  const cookies: Record<string, string> = {};
  for (const pair of raw.split(';')) {
    const eqIdx = pair.indexOf('=');
    if (eqIdx === -1) continue;

    const key = pair.substring(0, eqIdx).trim();
    const value = pair.substring(eqIdx + 1).trim();
    if (key) cookies[key] = value;
  }
  return cookies;
}

export function registerSessionMiddleware(app: FastifyInstance, sessions: SessionResolver): void {
  app.addHook('onRequest', async (req: FastifyRequest) => {
    const sessionId = parseCookies(req.headers.cookie)[SESSION_COOKIE_NAME];
    if (!sessionId) return;

    const user = await sessions.resolveSession(sessionId);
    if (!user) return;

    req.authContext = {
      userId: user.id,
      email: user.email,
      sessionId,
    };
  });
}
