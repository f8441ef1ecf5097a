/**
 * backend/src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * HOOK ORDER (onRequest):
 * 1. request context (requestId)
 * 2. auth context stub
 * 3. session cookie → auth context
 * 4. request log line
 */

import Fastify from 'fastify';
import formbody from '@fastify/formbody';

import type { AppConfig } from './config';
import type { AppDeps } from './di';
import { registerRequestContext } from '../shared/http/request-context';
import { registerAuthContext } from '../shared/http/auth-context';
import { registerErrorHandler } from '../shared/http/error-handler';
import { registerSessionMiddleware } from '../shared/session/session.middleware';

export async function buildServer(opts: { config: AppConfig; deps: AppDeps }) {
  const app = Fastify({
    logger: false, // we use our own Winston logger
  });

  // Every route accepts application/x-www-form-urlencoded as well as JSON.
  await app.register(formbody);

  registerRequestContext(app);
  registerAuthContext(app);
  registerSessionMiddleware(app, opts.deps.auth.authService);
  registerErrorHandler(app, opts.deps.logger);

  app.addHook('onRequest', async (req) => {
    opts.deps.logger.info('request', {
      method: req.method,
      url: req.url,
      requestId: req.requestContext.requestId,
      userId: req.authContext.userId,
    });
  });

  return app;
}
