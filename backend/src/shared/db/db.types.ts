/**
 * backend/src/shared/db/db.types.ts
 *
 * WHY:
 * - Kysely table interfaces for the schema created by ./migrations.
 *
 * RULES:
 * - Keep aligned with the migrations (snake_case column names).
 * - Only DAL files import these; the rest of the app uses domain types.
 */

import type { Generated } from 'kysely';

export interface UsersTable {
  id: Generated<number>;
  email: string;
  hashed_password: string;
  session_id: string | null;
  reset_token: string | null;
}

export interface DB {
  users: UsersTable;
}
