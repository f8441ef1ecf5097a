/**
 * backend/src/modules/users/helpers/format-user-row.ts
 *
 * WHY:
 * - Renders a user as one `column=value;` line for the user-data logger,
 *   using the same column names an operator sees in the table.
 *
 * RULES:
 * - Null renders as an empty value (`session_id=;`).
 * - Only the non-key columns are sensitive; `id` stays readable.
 */

import type { User } from '../user.types';

export const USER_ROW_SEPARATOR = ';';

export const USER_ROW_SENSITIVE_FIELDS = [
  'email',
  'hashed_password',
  'session_id',
  'reset_token',
] as const;

export function formatUserRow(user: User): string {
  const pairs: Array<[string, string | number | null]> = [
    ['id', user.id],
    ['email', user.email],
    ['hashed_password', user.hashedPassword],
    ['session_id', user.sessionId],
    ['reset_token', user.resetToken],
  ];

  return pairs
    .map(([column, value]) => `${column}=${value ?? ''}${USER_ROW_SEPARATOR}`)
    .join('');
}
