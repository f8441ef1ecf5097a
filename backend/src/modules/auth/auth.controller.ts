/**
 * src/modules/auth/auth.controller.ts
 *
 * WHY:
 * - Maps HTTP → service call for all auth endpoints.
 * - Sets the session cookie on login, clears it on logout.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - Cookie logic lives in shared/session/set-session-cookie (DRY).
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import type { ZodType, ZodTypeDef } from 'zod';
import {
  registerSchema,
  loginSchema,
  resetPasswordRequestSchema,
  updatePasswordSchema,
} from './auth.schemas';
import { AppError } from '../../shared/http/errors';
import type { AuthService } from './auth.service';
import { AuthErrors } from './auth.errors';
import { clearSessionCookie, setSessionCookie } from '../../shared/session/set-session-cookie';
import { requireSession } from '../../shared/http/require-auth-context';

function parseBody<T>(schema: ZodType<T, ZodTypeDef, unknown>, body: unknown): T {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw AppError.validationError('Invalid request body', {
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}

export class AuthController {
  constructor(
    private readonly authService: AuthService,
    private readonly isProduction: boolean,
  ) {}

  async register(req: FastifyRequest, reply: FastifyReply) {
    const input = parseBody(registerSchema, req.body);

    const user = await this.authService.register(input);

    return reply.status(200).send({ email: user.email, message: 'user created' });
  }

  async login(req: FastifyRequest, reply: FastifyReply) {
    const input = parseBody(loginSchema, req.body);

    const valid = await this.authService.validateLogin(input);
    if (!valid) throw AuthErrors.invalidCredentials();

    const sessionId = await this.authService.createSession(input.email);
    if (!sessionId) throw AuthErrors.invalidCredentials();

    setSessionCookie(reply, sessionId, this.isProduction);
    return reply.status(200).send({ email: input.email, message: 'logged in' });
  }

  async logout(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);

    await this.authService.destroySession(session.userId);

    clearSessionCookie(reply, this.isProduction);
    return reply.redirect('/');
  }

  async profile(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);
    return reply.status(200).send({ email: session.email });
  }

  async requestPasswordReset(req: FastifyRequest, reply: FastifyReply) {
    const input = parseBody(resetPasswordRequestSchema, req.body);

    const resetToken = await this.authService.requestPasswordReset(input.email);

    return reply.status(200).send({ email: input.email, reset_token: resetToken });
  }

  async updatePassword(req: FastifyRequest, reply: FastifyReply) {
    const input = parseBody(updatePasswordSchema, req.body);

    await this.authService.completePasswordReset({
      resetToken: input.reset_token,
      newPassword: input.new_password,
    });

    return reply.status(200).send({ email: input.email, message: 'Password updated' });
  }
}
