/**
 * backend/src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 *
 * HOW TO USE:
 * - In dev, backend/.env is loaded via dotenv.
 * - In prod, the platform injects env vars (no file).
 * - buildConfig(env) takes the env explicitly so tests don't mutate process.env.
 *
 * TYPING:
 * - nodeEnv is a union ('development' | 'test' | 'production'), not a plain string,
 *   so invalid values ('prod', 'staging') are caught at startup by Zod.
 * - Boolean flags accept only "true" / "false" (z.coerce.boolean would read "false" as true).
 */

import 'dotenv/config';
import { z } from 'zod';
import { PII_FIELDS } from '../shared/logger/redact';
import { SQLITE_MEMORY_URL } from '../shared/db/db';
import { MAX_BCRYPT_COST, MIN_BCRYPT_COST } from '../shared/security/bcrypt-password-hasher';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

const BooleanFlagSchema = z
  .enum(['true', 'false'])
  .default('false')
  .transform((v) => v === 'true');

const FieldListSchema = z
  .string()
  .default(PII_FIELDS.join(','))
  .transform((v) =>
    v
      .split(',')
      .map((f) => f.trim())
      .filter((f) => f.length > 0),
  );

const ConfigSchema = z.object({
  NODE_ENV: NodeEnvSchema,
  PORT: z.coerce.number().int().min(0).max(65535).default(5000),

  DATABASE_URL: z.string().min(1).default(SQLITE_MEMORY_URL),
  DB_RESET_ON_START: BooleanFlagSchema,

  // Logging / service identity
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  SERVICE_NAME: z.string().default('user-auth-service'),
  LOG_REDACT_FIELDS: FieldListSchema,

  BCRYPT_COST: z.coerce.number().int().min(MIN_BCRYPT_COST).max(MAX_BCRYPT_COST).default(12),
});

export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export type AppConfig = {
  nodeEnv: NodeEnv;
  port: number;

  databaseUrl: string;
  dbResetOnStart: boolean;

  logLevel: string;
  serviceName: string;
  logRedactFields: string[];

  bcryptCost: number;
};

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,

    databaseUrl: parsed.DATABASE_URL,
    dbResetOnStart: parsed.DB_RESET_ON_START,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,
    logRedactFields: parsed.LOG_REDACT_FIELDS,

    bcryptCost: parsed.BCRYPT_COST,
  };
}
