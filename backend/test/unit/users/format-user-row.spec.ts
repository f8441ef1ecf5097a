import { describe, it, expect } from 'vitest';
import { formatUserRow, USER_ROW_SENSITIVE_FIELDS } from '../../../src/modules/users';
import { redact } from '../../../src/shared/logger/redact';

describe('formatUserRow', () => {
  it('renders every column as column=value; with nulls empty', () => {
    expect(
      formatUserRow({
        id: 1,
        email: 'a@example.com',
        hashedPassword: '$2b$04$hash',
        sessionId: null,
        resetToken: 'tok-1',
      }),
    ).toBe('id=1;email=a@example.com;hashed_password=$2b$04$hash;session_id=;reset_token=tok-1;');
  });

  it('leaves only the id readable once redacted', () => {
    const line = formatUserRow({
      id: 2,
      email: 'b@example.com',
      hashedPassword: 'h',
      sessionId: 's',
      resetToken: null,
    });

    expect(redact(USER_ROW_SENSITIVE_FIELDS, '***', line, ';')).toBe(
      'id=2;email=***;hashed_password=***;session_id=***;reset_token=***;',
    );
  });
});
