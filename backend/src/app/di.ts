/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (db, logger) and shares them safely.
 * - Keeps modules testable (tests can pass their own logger).
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions belong HERE, not inside the classes themselves (DIP).
 */

import type { AppConfig } from './config';
import { createDb, parseDatabaseUrl } from '../shared/db/db';
import type { Db } from '../shared/db/db';
import { migrateToLatest } from '../shared/db/migrate';

import type { PasswordHasher } from '../shared/security/password-hasher';
import { BcryptPasswordHasher } from '../shared/security/bcrypt-password-hasher';

import { createLogger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { createUserModule } from '../modules/users/user.module';
import type { UserModule } from '../modules/users/user.module';

import { createAuthModule } from '../modules/auth/auth.module';
import type { AuthModule } from '../modules/auth/auth.module';

export type AppDeps = {
  db: Db;
  logger: Logger;
  passwordHasher: PasswordHasher;

  // modules
  users: UserModule;
  auth: AuthModule;

  // lifecycle
  close: () => Promise<void>;
};

export function createAppLogger(config: AppConfig): Logger {
  return createLogger({
    level: config.logLevel,
    service: config.serviceName,
    env: config.nodeEnv,
    redactFields: config.logRedactFields,
  });
}

export async function buildDeps(
  config: AppConfig,
  opts: { logger?: Logger } = {},
): Promise<AppDeps> {
  const logger = opts.logger ?? createAppLogger(config);

  const target = parseDatabaseUrl(config.databaseUrl);
  const db = createDb(target);

  try {
    await migrateToLatest(db, {
      dialect: target.dialect,
      reset: config.dbResetOnStart,
      logger,
    });
  } catch (err) {
    await db.destroy();
    throw err;
  }

  const passwordHasher: PasswordHasher = new BcryptPasswordHasher({
    cost: config.bcryptCost,
  });

  // modules (no HTTP / no business logic here)
  const users = createUserModule({ db });

  const auth = createAuthModule({
    db,
    passwordHasher,
    logger,
    userRepo: users.userRepo,
    isProduction: config.nodeEnv === 'production',
  });

  return {
    db,
    logger,
    passwordHasher,
    users,
    auth,
    close: async () => {
      await db.destroy();
    },
  };
}
