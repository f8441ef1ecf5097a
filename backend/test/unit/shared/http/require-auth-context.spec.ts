import { describe, it, expect } from 'vitest';
import type { FastifyRequest } from 'fastify';
import { requireSession } from '../../../../src/shared/http/require-auth-context';
import { AppError } from '../../../../src/shared/http/errors';
import type { AuthContext } from '../../../../src/shared/http/auth-context';

function makeReq(authContext: AuthContext | null): FastifyRequest {
  return { authContext } as unknown as FastifyRequest;
}

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected function to throw');
}

describe('requireSession', () => {
  it('returns the resolved session', () => {
    const req = makeReq({ userId: 7, email: 'a@example.com', sessionId: 'sess-1' });

    expect(requireSession(req)).toEqual({
      userId: 7,
      email: 'a@example.com',
      sessionId: 'sess-1',
    });
  });

  it('throws 403 when the auth context was never set', () => {
    const err = captureError(() => requireSession(makeReq(null)));

    expect(err).toBeInstanceOf(AppError);
    expect(err).toMatchObject({ status: 403, code: 'FORBIDDEN', message: 'Forbidden' });
  });

  it('throws 403 for the anonymous stub', () => {
    const err = captureError(() =>
      requireSession(makeReq({ userId: null, email: null, sessionId: null })),
    );

    expect(err).toMatchObject({ status: 403, code: 'FORBIDDEN' });
  });

  it('throws 403 when any field is missing', () => {
    const err = captureError(() =>
      requireSession(makeReq({ userId: 7, email: 'a@example.com', sessionId: null })),
    );

    expect(err).toMatchObject({ status: 403 });
  });
});
