/**
 * backend/src/modules/users/index.ts
 *
 * WHY:
 * - Define the public surface of the users module.
 * - Prevent cross-module coupling via deep imports into /queries or /dal.
 *
 * RULES:
 * - Only export stable contracts needed by other modules.
 */

export { findUserBy, listUsers } from './queries/user.queries';
export { formatUserRow, USER_ROW_SENSITIVE_FIELDS } from './helpers/format-user-row';
export { logUserRows } from './helpers/log-user-rows';
export { UserNotFoundError, InvalidQueryError, InvalidAttributeError } from './user.errors';
export type { UserRepo } from './dal/user.repo';
export type { User, UserId, UserCriteria, UserUpdate, FindUserResult } from './user.types';
