/**
 * src/modules/auth/auth.service.ts
 *
 * WHY:
 * - Orchestrates registration, credential checks, the per-user session and the
 *   password-reset token. Controllers call this; nothing else touches the users table
 *   for auth purposes.
 *
 * STATE (per user row):
 * - sessionId:  null ─createSession→ id ─createSession→ new id ─destroySession→ null
 * - resetToken: null ─requestPasswordReset→ token ─completePasswordReset→ null
 *
 * FAILURE SHAPES (callers depend on these exactly):
 * - register:              duplicate email        → throws AuthErrors.alreadyRegistered
 * - validateLogin:         unknown email / wrong  → false
 * - createSession:         unknown email          → null (no write)
 * - resolveSession:        no id / unknown id     → null
 * - destroySession:        already logged out     → no-op
 * - requestPasswordReset:  unknown email          → throws AuthErrors.unknownEmail
 * - completePasswordReset: unknown / used token   → throws AuthErrors.resetTokenInvalid
 *
 * RULES:
 * - Only "no matching row" counts as not-found. Store errors (InvalidQueryError, ...) propagate.
 * - Never log raw passwords, hashes, session ids or tokens.
 * - Email uniqueness is a read-then-insert check; concurrent registrations can both pass.
 */

import type { DbExecutor } from '../../shared/db/db';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { Logger } from '../../shared/logger/logger';
import { generateOpaqueId } from '../../shared/security/token';

import { findUserBy } from '../users';
import type { User, UserId, UserRepo } from '../users';

import { AuthErrors } from './auth.errors';
import { emailDomain } from './helpers/email-domain';

// ── Params ──────────────────────────────────────────────────

export type RegisterParams = {
  email: string;
  password: string;
};

export type LoginParams = {
  email: string;
  password: string;
};

export type CompletePasswordResetParams = {
  resetToken: string;
  newPassword: string;
};

// ── Service ─────────────────────────────────────────────────

export class AuthService {
  constructor(
    private readonly deps: {
      db: DbExecutor;
      userRepo: UserRepo;
      passwordHasher: PasswordHasher;
      logger: Logger;
    },
  ) {}

  // ── Register ─────────────────────────────────────────────

  async register(params: RegisterParams): Promise<User> {
    const existing = await findUserBy(this.deps.db, { email: params.email });

    if (existing.found) {
      this.deps.logger.info('auth.register.rejected', {
        flow: 'auth.register',
        reason: 'already_registered',
        userId: existing.user.id,
      });
      throw AuthErrors.alreadyRegistered();
    }

    const hashedPassword = await this.deps.passwordHasher.hash(params.password);
    const user = await this.deps.userRepo.insertUser({ email: params.email, hashedPassword });

    this.deps.logger.info('auth.register.success', {
      flow: 'auth.register',
      userId: user.id,
      emailDomain: emailDomain(user.email),
    });

    return user;
  }

  // ── Login ────────────────────────────────────────────────

  async validateLogin(params: LoginParams): Promise<boolean> {
    const result = await findUserBy(this.deps.db, { email: params.email });

    if (!result.found) {
      this.deps.logger.info('auth.login.failed', { flow: 'auth.login', reason: 'unknown_email' });
      return false;
    }

    const ok = await this.deps.passwordHasher.verify(params.password, result.user.hashedPassword);
    if (!ok) {
      this.deps.logger.info('auth.login.failed', {
        flow: 'auth.login',
        reason: 'bad_password',
        userId: result.user.id,
      });
    }

    return ok;
  }

  // ── Sessions ─────────────────────────────────────────────

  /**
   * Issues a fresh session id for the user, replacing any previous one.
   * Unknown email → null; callers must treat that as "no session issued".
   */
  async createSession(email: string): Promise<string | null> {
    const result = await findUserBy(this.deps.db, { email });
    if (!result.found) {
      this.deps.logger.info('auth.session.not_created', {
        flow: 'auth.session',
        reason: 'unknown_email',
      });
      return null;
    }

    const sessionId = generateOpaqueId();
    await this.deps.userRepo.updateUser(result.user.id, { sessionId });

    this.deps.logger.info('auth.session.created', {
      flow: 'auth.session',
      userId: result.user.id,
      replacedExisting: result.user.sessionId !== null,
    });

    return sessionId;
  }

  async resolveSession(sessionId: string | null | undefined): Promise<User | null> {
    if (!sessionId) return null;

    const result = await findUserBy(this.deps.db, { sessionId });
    return result.found ? result.user : null;
  }

  async destroySession(userId: UserId): Promise<void> {
    await this.deps.userRepo.updateUser(userId, { sessionId: null });

    this.deps.logger.info('auth.session.destroyed', { flow: 'auth.session', userId });
  }

  // ── Password reset ───────────────────────────────────────

  /**
   * Returns a new reset token. Any token issued earlier for this user stops working.
   */
  async requestPasswordReset(email: string): Promise<string> {
    const result = await findUserBy(this.deps.db, { email });
    if (!result.found) {
      this.deps.logger.info('auth.password_reset.rejected', {
        flow: 'auth.password-reset',
        reason: 'unknown_email',
      });
      throw AuthErrors.unknownEmail();
    }

    const resetToken = generateOpaqueId();
    await this.deps.userRepo.updateUser(result.user.id, { resetToken });

    this.deps.logger.info('auth.password_reset.requested', {
      flow: 'auth.password-reset',
      userId: result.user.id,
    });

    return resetToken;
  }

  /**
   * Sets the new password hash and clears the token in the same UPDATE,
   * so a token can never be used twice.
   */
  async completePasswordReset(params: CompletePasswordResetParams): Promise<void> {
    const result = await findUserBy(this.deps.db, { resetToken: params.resetToken });
    if (!result.found) {
      this.deps.logger.info('auth.password_reset.rejected', {
        flow: 'auth.password-reset',
        reason: 'invalid_token',
      });
      throw AuthErrors.resetTokenInvalid();
    }

    const hashedPassword = await this.deps.passwordHasher.hash(params.newPassword);
    await this.deps.userRepo.updateUser(result.user.id, { hashedPassword, resetToken: null });

    this.deps.logger.info('auth.password_reset.completed', {
      flow: 'auth.password-reset',
      userId: result.user.id,
    });
  }
}
