/**
 * backend/src/modules/users/queries/user.queries.ts
 *
 * WHY:
 * - Queries are read-only and side-effect free.
 * - They shape DB rows into User domain types.
 * - "Not found" is a value (FindUserResult), not an exception; callers branch on it.
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 */

import type { DbExecutor } from '../../../shared/db/db';
import {
  USER_COLUMNS,
  selectAllUsersSql,
  selectFirstUserWhereSql,
  toUser,
} from '../dal/user.query-sql';
import type { UserCondition } from '../dal/user.query-sql';
import { InvalidQueryError } from '../user.errors';
import { isUserAttribute } from '../user.types';
import type { FindUserResult, User, UserCriteria } from '../user.types';

function toConditions(criteria: UserCriteria): UserCondition[] {
  const conditions: UserCondition[] = [];

  for (const key of Object.keys(criteria)) {
    if (!isUserAttribute(key)) throw new InvalidQueryError(`Unknown user attribute: ${key}`);

    const value = criteria[key];
    if (value === undefined) continue;

    conditions.push({ column: USER_COLUMNS[key], value });
  }

  if (conditions.length === 0) throw new InvalidQueryError('No attributes to filter by');
  return conditions;
}

export async function findUserBy(db: DbExecutor, criteria: UserCriteria): Promise<FindUserResult> {
  const row = await selectFirstUserWhereSql(db, toConditions(criteria));
  if (!row) return { found: false };
  return { found: true, user: toUser(row) };
}

export async function listUsers(db: DbExecutor): Promise<User[]> {
  const rows = await selectAllUsersSql(db);
  return rows.map(toUser);
}
