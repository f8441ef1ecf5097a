import { createDb } from '../../src/shared/db/db';
import type { Db } from '../../src/shared/db/db';
import { migrateToLatest } from '../../src/shared/db/migrate';
import { createLogger } from '../../src/shared/logger/logger';
import type { Logger } from '../../src/shared/logger/logger';

export function createTestLogger(): Logger {
  return createLogger({
    level: 'error',
    service: 'user-auth-service',
    env: 'test',
    silent: true,
  });
}

/** Fresh, migrated in-memory SQLite database. Caller destroys it. */
export async function buildTestDb(): Promise<Db> {
  const db = createDb({ dialect: 'sqlite', filename: ':memory:' });
  await migrateToLatest(db, { dialect: 'sqlite', reset: false, logger: createTestLogger() });
  return db;
}
