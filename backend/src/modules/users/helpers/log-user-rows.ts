/**
 * backend/src/modules/users/helpers/log-user-rows.ts
 *
 * WHY:
 * - Writes every stored user to a (redacting) logger, one formatted line per row.
 *
 * RULES:
 * - The logger decides what gets masked; pass one built by createUserDataLogger
 *   with USER_ROW_SENSITIVE_FIELDS.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { Logger } from '../../../shared/logger/logger';
import { listUsers } from '../queries/user.queries';
import { formatUserRow } from './format-user-row';

export async function logUserRows(db: DbExecutor, userDataLogger: Logger): Promise<number> {
  const users = await listUsers(db);
  for (const user of users) {
    userDataLogger.info(formatUserRow(user));
  }
  return users.length;
}
