/**
 * backend/src/shared/logger/redacting-format.ts
 *
 * WHY:
 * - Plugs `redact()` into the winston pipeline so every transport gets a masked message.
 * - Only `info.message` is touched: timestamp, level, label and meta stay as they are.
 *
 * HOW TO USE:
 * - winston.format.combine(redactingFormat({ fields: PII_FIELDS }), winston.format.json())
 */

import { format } from 'winston';
import type { Logform } from 'winston';
import { DEFAULT_REDACTION_MASK, DEFAULT_SEPARATOR, redact } from './redact';

export type RedactingFormatOptions = {
  fields: readonly string[];
  mask?: string;
  separator?: string;
};

export function redactingFormat(opts: RedactingFormatOptions): Logform.Format {
  const mask = opts.mask ?? DEFAULT_REDACTION_MASK;
  const separator = opts.separator ?? DEFAULT_SEPARATOR;
  const fields = [...opts.fields];

  return format((info) => {
    if (typeof info.message === 'string') {
      info.message = redact(fields, mask, info.message, separator);
    }
    return info;
  })();
}
