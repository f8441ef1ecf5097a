/**
 * backend/src/modules/users/user.errors.ts
 *
 * WHY:
 * - Store-level failures. These are NOT AppErrors: the auth service decides how
 *   each one surfaces (null, false or a domain error).
 *
 * RULES:
 * - InvalidQueryError / InvalidAttributeError signal caller bugs; let them propagate.
 */

import type { UserId } from './user.types';

export class UserNotFoundError extends Error {
  readonly userId: UserId;

  constructor(userId: UserId) {
    super(`No user with id ${userId}`);
    this.name = 'UserNotFoundError';
    this.userId = userId;
  }
}

export class InvalidQueryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidQueryError';
  }
}

export class InvalidAttributeError extends Error {
  readonly attribute: string;

  constructor(attribute: string) {
    super(`${attribute} is not a valid attribute of User`);
    this.name = 'InvalidAttributeError';
    this.attribute = attribute;
  }
}
