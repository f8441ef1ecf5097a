/**
 * backend/src/modules/users/dal/user.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for users (raw SQL access).
 * - Owns the mapping between domain attribute names and table columns.
 *
 * RULES:
 * - No AppError.
 * - No policies.
 * - "First match" always means lowest id (insertion order).
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { UsersTable } from '../../../shared/db/db.types';
import type { User, UserAttribute, UserId } from '../user.types';

export type UserRow = Selectable<UsersTable>;

export type UserColumn = keyof UsersTable;

export const USER_COLUMNS = {
  id: 'id',
  email: 'email',
  hashedPassword: 'hashed_password',
  sessionId: 'session_id',
  resetToken: 'reset_token',
} as const satisfies Record<UserAttribute, UserColumn>;

export type UserCondition = {
  column: UserColumn;
  value: string | number | null;
};

export function toUser(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    hashedPassword: row.hashed_password,
    sessionId: row.session_id ?? null,
    resetToken: row.reset_token ?? null,
  };
}

export async function selectFirstUserWhereSql(
  db: DbExecutor,
  conditions: readonly UserCondition[],
): Promise<UserRow | undefined> {
  let query = db.selectFrom('users').selectAll();

  for (const { column, value } of conditions) {
    query = value === null ? query.where(column, 'is', null) : query.where(column, '=', value);
  }

  return query.orderBy('id', 'asc').limit(1).executeTakeFirst();
}

export async function selectUserByIdSql(
  db: DbExecutor,
  userId: UserId,
): Promise<UserRow | undefined> {
  return db.selectFrom('users').selectAll().where('id', '=', userId).executeTakeFirst();
}

export async function selectAllUsersSql(db: DbExecutor): Promise<UserRow[]> {
  return db.selectFrom('users').selectAll().orderBy('id', 'asc').execute();
}
