import { describe, it, expect } from 'vitest';
import { redactMeta } from '../../../../src/shared/http/error-handler';

describe('redactMeta', () => {
  it('replaces credential-bearing keys', () => {
    expect(
      redactMeta({
        email: 'a@example.com',
        password: 'pw',
        session_id: 'sess',
        reset_token: 'tok',
        userId: 3,
      }),
    ).toEqual({
      email: 'a@example.com',
      password: '[REDACTED]',
      session_id: '[REDACTED]',
      reset_token: '[REDACTED]',
      userId: 3,
    });
  });

  it('passes through non-objects', () => {
    expect(redactMeta(undefined)).toBeUndefined();
    expect(redactMeta('text')).toBe('text');
  });
});
