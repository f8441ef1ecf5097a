/**
 * backend/src/shared/http/error-handler.ts
 *
 * WHY:
 * - Fastify's default error handler doesn't understand AppError.
 * - We need consistent error responses across all endpoints.
 * - Internal details (meta, stack traces, SQL) must never leak to clients.
 *
 * RESPONSIBILITIES:
 * - AppError → map .status to a `{ message }` response.
 * - Zod validation errors → 400 (safety net if controller misses).
 * - Fastify client errors (bad content type, malformed body) → their own 4xx.
 * - Unexpected errors → 500 with generic message.
 * - Log all errors with request context for debugging.
 *
 * RULES:
 * - No business logic here.
 * - Never expose .meta or stack traces in responses.
 */

import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';
import { AppError } from './errors';
import type { Logger } from '../logger/logger';
import { withRequestContext } from '../logger/with-context';

type ErrorResponseBody = {
  message: string;
};

const SENSITIVE_META_KEYS = new Set([
  'password',
  'newPassword',
  'new_password',
  'hashedPassword',
  'sessionId',
  'session_id',
  'resetToken',
  'reset_token',
  'token',
]);

export function redactMeta(meta: unknown): unknown {
  if (!meta || typeof meta !== 'object') return meta;

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(meta)) {
    out[k] = SENSITIVE_META_KEYS.has(k) ? '[REDACTED]' : v;
  }
  return out;
}

function buildResponse(message: string): ErrorResponseBody {
  return { message };
}

export function registerErrorHandler(app: FastifyInstance, logger: Logger): void {
  app.setErrorHandler((err: FastifyError, req: FastifyRequest, reply: FastifyReply) => {
    const log = withRequestContext(logger, req);

    // 1) Known application errors
    if (err instanceof AppError) {
      log.warn('app_error', {
        flow: 'http.error',
        code: err.code,
        status: err.status,
        message: err.message,
        meta: redactMeta(err.meta),
      });

      return reply.status(err.status).send(buildResponse(err.message));
    }

    // 2) Schema errors that escaped a controller
    if (err instanceof ZodError) {
      log.warn('validation_error', { flow: 'http.error', issues: err.issues.length });
      return reply.status(400).send(buildResponse('Invalid request body'));
    }

    // 3) Fastify's own client errors (unsupported media type, bad JSON, ...)
    if (typeof err.statusCode === 'number' && err.statusCode >= 400 && err.statusCode < 500) {
      log.warn('client_error', { flow: 'http.error', code: err.code, status: err.statusCode });
      return reply.status(err.statusCode).send(buildResponse('Bad request'));
    }

    // 4) Unexpected errors: never leak internals
    log.error('unhandled_error', {
      flow: 'http.error',
      message: err.message,
      stack: err.stack,
    });

    return reply.status(500).send(buildResponse('Internal server error'));
  });
}
