/**
 * backend/src/shared/db/migrate.ts
 *
 * WHY:
 * - Schema is owned by Kysely migrations, applied at startup by the composition root.
 * - Migrations are registered statically (not read from disk), so the same
 *   code path works under tsx, vitest and compiled dist/.
 *
 * HOW TO USE:
 * - await migrateToLatest(db, { dialect, reset: false, logger })
 * - reset: true rolls every migration back first (drop → create). Dev convenience only.
 */

import { Migrator, NO_MIGRATIONS } from 'kysely';
import type { Migration, MigrationResultSet } from 'kysely';

import type { Db, DbDialect } from './db';
import type { Logger } from '../logger/logger';
import { createUsersMigration } from './migrations/0001_users';

export function buildMigrations(dialect: DbDialect): Record<string, Migration> {
  return {
    '0001_users': createUsersMigration(dialect),
  };
}

function report(logger: Logger, direction: 'up' | 'down', resultSet: MigrationResultSet): void {
  resultSet.results?.forEach((r) => {
    if (r.status === 'Success')
      logger.info('migration success', { migration: r.migrationName, direction });
    if (r.status === 'Error')
      logger.error('migration error', { migration: r.migrationName, direction });
  });

  if (resultSet.error) {
    logger.error('Migration failed', { direction, err: resultSet.error });
    throw resultSet.error;
  }
}

export async function migrateToLatest(
  db: Db,
  opts: { dialect: DbDialect; reset: boolean; logger: Logger },
): Promise<void> {
  const migrator = new Migrator({
    db,
    provider: {
      getMigrations: async () => buildMigrations(opts.dialect),
    },
  });

  if (opts.reset) {
    report(opts.logger, 'down', await migrator.migrateTo(NO_MIGRATIONS));
  }

  report(opts.logger, 'up', await migrator.migrateToLatest());
  opts.logger.debug('Migrations up to date');
}
