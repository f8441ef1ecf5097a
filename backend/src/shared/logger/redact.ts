/**
 * backend/src/shared/logger/redact.ts
 *
 * WHY:
 * - Log lines in `key=value;key=value;` form routinely carry PII
 *   (emails, SSNs, passwords). The value part must be masked before the
 *   line leaves the process.
 *
 * HOW TO USE:
 * - redact(['password', 'ssn'], '***', 'name=Bob;ssn=000-00-0000;password=x;', ';')
 *   → 'name=Bob;ssn=***;password=***;'
 *
 * RULES:
 * - A value runs from `=` up to the next separator, or to the end of the message
 *   when no separator follows (newlines included).
 * - A field matches wherever `<field>=` appears, even inside a longer key:
 *   `name` also masks the value of `username=`.
 * - Pure function; no logger dependency.
 */

/** PII commonly found in user-data log lines. */
export const PII_FIELDS = ['name', 'email', 'phone', 'ssn', 'password'] as const;

export const DEFAULT_REDACTION_MASK = '***';
export const DEFAULT_SEPARATOR = ';';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\/-]/g, '\\$&');
}

export function redact(
  fields: readonly string[],
  mask: string,
  message: string,
  separator: string,
): string {
  if (separator.length !== 1) {
    throw new RangeError(`separator must be a single character, got "${separator}"`);
  }

  const names = fields.filter((f) => f.length > 0);
  if (names.length === 0) return message;

  const sep = escapeRegExp(separator);
  const pattern = new RegExp(`(${names.map(escapeRegExp).join('|')})=[^${sep}]*`, 'g');

  // Replacer function: `$` in the mask must stay literal.
  return message.replace(pattern, (_match, field: string) => `${field}=${mask}`);
}
