/**
 * backend/src/shared/http/auth-context.ts
 *
 * WHY:
 * - Every handler needs to know whether the caller holds a live session.
 *
 * HOW IT WORKS:
 * 1. registerAuthContext() sets a stub (all null) on every request.
 * 2. Session middleware overwrites it when the `session_id` cookie resolves to a user.
 * 3. Controllers read it through requireSession().
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { UserId } from '../../modules/users';

export type AuthContext = {
  userId: UserId | null;
  email: string | null;
  sessionId: string | null;
};

declare module 'fastify' {
  interface FastifyRequest {
    authContext: AuthContext;
  }
}

export function registerAuthContext(app: FastifyInstance) {
  app.decorateRequest('authContext', null);

  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    req.authContext = {
      userId: null,
      email: null,
      sessionId: null,
    };

    done();
  });
}
