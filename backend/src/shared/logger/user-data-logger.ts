/**
 * backend/src/shared/logger/user-data-logger.ts
 *
 * WHY:
 * - Operator-facing text logger for dumping user records.
 * - Unlike the JSON app logger, output is one human-readable line per record,
 *   and it always runs the message through the redacting format.
 *
 * FORMAT:
 *   [<service>] user_data INFO 2024-01-01T00:00:00.000Z: name=***;email=***;
 */

import winston from 'winston';
import { redactingFormat } from './redacting-format';
import { PII_FIELDS } from './redact';
import type { Logger } from './logger';

export const USER_DATA_LOGGER_LABEL = 'user_data';

export type UserDataLoggerOptions = {
  fields?: readonly string[];
  level?: string;
  service?: string;
  transports?: winston.LoggerOptions['transports'];
};

export function createUserDataLogger(opts: UserDataLoggerOptions = {}): Logger {
  const service = opts.service ?? 'user-auth-service';

  return winston.createLogger({
    level: opts.level ?? 'info',
    format: winston.format.combine(
      winston.format.label({ label: USER_DATA_LOGGER_LABEL }),
      winston.format.timestamp(),
      redactingFormat({ fields: opts.fields ?? PII_FIELDS }),
      winston.format.printf(
        (info) =>
          `[${service}] ${String(info.label)} ${info.level.toUpperCase()} ${String(info.timestamp)}: ${String(info.message)}`,
      ),
    ),
    transports: opts.transports ?? [new winston.transports.Console()],
  });
}
