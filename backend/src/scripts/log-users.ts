/**
 * backend/src/scripts/log-users.ts
 *
 * WHY:
 * - Operators sometimes need to eyeball stored users without exposing PII.
 * - Prints one redacted `column=value;` line per row through the user-data logger.
 *
 * HOW TO USE:
 * - npm run users:log --workspace backend   (reads DATABASE_URL like the server)
 */

import { buildConfig } from '../app/config';
import { createAppLogger } from '../app/di';
import { createDb, parseDatabaseUrl } from '../shared/db/db';
import { migrateToLatest } from '../shared/db/migrate';
import { createUserDataLogger } from '../shared/logger/user-data-logger';
import { USER_ROW_SENSITIVE_FIELDS } from '../modules/users';
import { createUserModule } from '../modules/users/user.module';

const config = buildConfig();
const logger = createAppLogger(config);

async function main(): Promise<void> {
  const target = parseDatabaseUrl(config.databaseUrl);
  const db = createDb(target);

  try {
    await migrateToLatest(db, { dialect: target.dialect, reset: false, logger });

    const userDataLogger = createUserDataLogger({
      fields: USER_ROW_SENSITIVE_FIELDS,
      service: config.serviceName,
    });
    const count = await createUserModule({ db }).logRows(userDataLogger);

    logger.info('users.logged', { count });
  } finally {
    await db.destroy();
  }
}

void main().catch((err: unknown) => {
  logger.error('users.log_failed', { err });
  process.exit(1);
});
