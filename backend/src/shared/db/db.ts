/**
 * backend/src/shared/db/db.ts
 *
 * WHY:
 * - Central place to create the Kysely DB connection.
 * - One query layer over two engines:
 *     postgres://…  → pg pool (deployments)
 *     sqlite:<file> → better-sqlite3 (local dev, tests with `sqlite::memory:`)
 *
 * HOW TO USE:
 * - const target = parseDatabaseUrl(config.databaseUrl)
 * - const db = createDb(target)
 * - Run migrations with migrateToLatest(db, { dialect: target.dialect, ... }).
 */

import pg from 'pg';
import Database from 'better-sqlite3';
import { Kysely, PostgresDialect, SqliteDialect } from 'kysely';

import type { DB } from './db.types';

export type Db = Kysely<DB>;

/**
 * DbExecutor is the only DB "capability" DAL/queries should accept.
 * Prevents leaking concrete DB construction into modules.
 */
export type DbExecutor = Kysely<DB>;

export type DbDialect = 'postgres' | 'sqlite';

export type DatabaseTarget =
  | { dialect: 'postgres'; connectionString: string }
  | { dialect: 'sqlite'; filename: string };

export const SQLITE_MEMORY_URL = 'sqlite::memory:';

/**
 * `sqlite::memory:`   → in-process database, gone on close
 * `sqlite:./a.db`     → relative file
 * `sqlite:///tmp/a.db`→ absolute file
 */
export function parseDatabaseUrl(url: string): DatabaseTarget {
  if (url.startsWith('postgres://') || url.startsWith('postgresql://')) {
    return { dialect: 'postgres', connectionString: url };
  }

  if (url.startsWith('sqlite:')) {
    const rest = url.slice('sqlite:'.length);
    const filename = rest.startsWith('//') ? rest.slice(2) : rest;
    if (!filename) throw new Error('DATABASE_URL: sqlite URL is missing a filename');
    return { dialect: 'sqlite', filename };
  }

  throw new Error('DATABASE_URL: unsupported scheme (expected postgres:// or sqlite:)');
}

export function createDb(target: DatabaseTarget): Db {
  if (target.dialect === 'sqlite') {
    return new Kysely<DB>({
      dialect: new SqliteDialect({ database: new Database(target.filename) }),
    });
  }

  const pool = new pg.Pool({
    connectionString: target.connectionString,
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
  });

  return new Kysely<DB>({
    dialect: new PostgresDialect({ pool }),
  });
}
