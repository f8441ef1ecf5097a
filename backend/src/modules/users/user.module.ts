/**
 * backend/src/modules/users/user.module.ts
 *
 * WHY:
 * - The users table has no routes of its own; this module hands its repo to
 *   auth and its row dump to the operator script.
 *
 * RULES:
 * - DI passes the db in; nothing here opens connections.
 */

import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import { UserRepo } from './dal/user.repo';
import { logUserRows } from './helpers/log-user-rows';

export type UserModule = ReturnType<typeof createUserModule>;

export function createUserModule(deps: { db: DbExecutor }) {
  return {
    userRepo: new UserRepo(deps.db),

    /** Writes every user row to `userDataLogger`; resolves to the row count. */
    logRows: (userDataLogger: Logger) => logUserRows(deps.db, userDataLogger),
  };
}
