/**
 * src/modules/auth/auth.errors.ts
 *
 * WHY:
 * - Auth module owns its domain-specific error semantics.
 * - Messages are the exact strings the HTTP API promises.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never include passwords, tokens, or hashes in meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const AuthErrors = {
  /** Registration: a user with this email already exists. */
  alreadyRegistered(meta?: AppErrorMeta) {
    return AppError.alreadyExists('email already registered', meta);
  },

  /** Login: wrong email or password, or no session could be issued. Intentionally vague. */
  invalidCredentials(meta?: AppErrorMeta) {
    return AppError.unauthorized('Unauthorized', meta);
  },

  /** Reset request for an email nobody registered. */
  unknownEmail(meta?: AppErrorMeta) {
    return AppError.forbidden('Forbidden', meta);
  },

  /**
   * Reset token unknown or already consumed.
   * One error for both: a consumed token must be indistinguishable from one never issued.
   */
  resetTokenInvalid(meta?: AppErrorMeta) {
    return AppError.forbidden('Forbidden', meta);
  },
} as const;
