/**
 * backend/src/modules/users/dal/user.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for users (mutations).
 *
 * RULES:
 * - No AppError (store errors live in ../user.errors).
 * - No policies: email uniqueness is NOT checked here (and there is no DB constraint).
 * - Every call is a single auto-committed statement.
 */

import type { Updateable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { UsersTable } from '../../../shared/db/db.types';
import { InvalidAttributeError, UserNotFoundError } from '../user.errors';
import { isUserAttribute } from '../user.types';
import type { User, UserId, UserUpdate } from '../user.types';
import { selectUserByIdSql, toUser } from './user.query-sql';

function toUserPatch(fields: UserUpdate): Updateable<UsersTable> {
  for (const key of Object.keys(fields)) {
    if (!isUserAttribute(key)) throw new InvalidAttributeError(key);
  }

  const patch: Updateable<UsersTable> = {};
  if (fields.id !== undefined) patch.id = fields.id;
  if (fields.email !== undefined) patch.email = fields.email;
  if (fields.hashedPassword !== undefined) patch.hashed_password = fields.hashedPassword;
  if (fields.sessionId !== undefined) patch.session_id = fields.sessionId;
  if (fields.resetToken !== undefined) patch.reset_token = fields.resetToken;
  return patch;
}

export class UserRepo {
  constructor(private readonly db: DbExecutor) {}

  async insertUser(params: { email: string; hashedPassword: string }): Promise<User> {
    const row = await this.db
      .insertInto('users')
      .values({
        email: params.email,
        hashed_password: params.hashedPassword,
        session_id: null,
        reset_token: null,
      })
      .returningAll()
      .executeTakeFirstOrThrow();

    return toUser(row);
  }

  /**
   * Applies every field in one UPDATE statement, or none of them.
   * Throws UserNotFoundError before looking at the fields, then
   * InvalidAttributeError before writing anything.
   */
  async updateUser(userId: UserId, fields: UserUpdate): Promise<void> {
    const existing = await selectUserByIdSql(this.db, userId);
    if (!existing) throw new UserNotFoundError(userId);

    const patch = toUserPatch(fields);
    if (Object.keys(patch).length === 0) return;

    await this.db.updateTable('users').set(patch).where('id', '=', userId).execute();
  }
}
