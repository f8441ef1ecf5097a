import type { Kysely, Migration } from 'kysely';
import type { DbDialect } from '../db';

// Email is deliberately NOT unique at the DB level; registration checks it in the service.
export function createUsersMigration(dialect: DbDialect): Migration {
  return {
    async up(db: Kysely<unknown>): Promise<void> {
      await db.schema
        .createTable('users')
        .addColumn('id', dialect === 'postgres' ? 'serial' : 'integer', (col) => col.primaryKey())
        .addColumn('email', 'varchar(250)', (col) => col.notNull())
        .addColumn('hashed_password', 'varchar(250)', (col) => col.notNull())
        .addColumn('session_id', 'varchar(250)')
        .addColumn('reset_token', 'varchar(250)')
        .execute();
    },

    async down(db: Kysely<unknown>): Promise<void> {
      await db.schema.dropTable('users').ifExists().execute();
    },
  };
}
