/**
 * backend/src/shared/logger/logger.ts
 *
 * WHY:
 * - Structured JSON logs, consistent across app/modules.
 * - Stable metadata (service, env) on every line.
 * - PII in `key=value;` messages is masked before any transport sees it.
 *
 * HOW TO USE:
 * - The composition root (app/di.ts) builds ONE logger and passes it down.
 *   There is no module-level logger instance to import.
 * - Prefer `withRequestContext(logger, req)` inside request handlers.
 * - Do not log raw Error objects only; pass `{ err }` so stack/message is preserved.
 */

import winston from 'winston';
import { redactingFormat } from './redacting-format';
import { PII_FIELDS } from './redact';

export type Logger = winston.Logger;

export type LoggerOptions = {
  level: string;
  service: string;
  env: string;
  redactFields?: readonly string[];
  silent?: boolean;
  transports?: winston.LoggerOptions['transports'];
};

export function createLogger(opts: LoggerOptions): Logger {
  return winston.createLogger({
    level: opts.level,
    silent: opts.silent ?? false,
    format: winston.format.combine(
      redactingFormat({ fields: opts.redactFields ?? PII_FIELDS }),
      winston.format.timestamp(),
      winston.format.errors({ stack: true }), // ensures Error.stack is serialized
      winston.format.json(),
    ),
    defaultMeta: {
      service: opts.service,
      env: opts.env,
    },
    transports: opts.transports ?? [new winston.transports.Console()],
  });
}
