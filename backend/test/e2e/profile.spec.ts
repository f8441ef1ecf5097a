import { describe, it, expect } from 'vitest';
import { buildTestApp } from '../helpers/build-test-app';
import { FORM_HEADERS, form, readJson, readSessionCookie } from '../helpers/http';

type ProfileResponseBody = { email: string };
type ErrorResponseBody = { message: string };

describe('GET /profile', () => {
  it('returns the email of the logged-in user', async () => {
    const { app, close } = await buildTestApp();

    try {
      const credentials = form({ email: 'a@example.com', password: 'pw-1' });
      await app.inject({ method: 'POST', url: '/users', headers: FORM_HEADERS, payload: credentials });
      const loginRes = await app.inject({
        method: 'POST',
        url: '/sessions',
        headers: FORM_HEADERS,
        payload: credentials,
      });
      const sessionId = readSessionCookie(loginRes.headers['set-cookie']);

      const res = await app.inject({
        method: 'GET',
        url: '/profile',
        headers: { cookie: `theme=dark; session_id=${sessionId}` },
      });

      expect(res.statusCode).toBe(200);
      expect(readJson<ProfileResponseBody>(res)).toEqual({ email: 'a@example.com' });
    } finally {
      await close();
    }
  });

  it('returns 403 without a session cookie', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({ method: 'GET', url: '/profile' });

      expect(res.statusCode).toBe(403);
      expect(readJson<ErrorResponseBody>(res)).toEqual({ message: 'Forbidden' });
    } finally {
      await close();
    }
  });

  it('returns 403 for an unknown session id', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({
        method: 'GET',
        url: '/profile',
        headers: { cookie: 'session_id=no-such-session' },
      });

      expect(res.statusCode).toBe(403);
    } finally {
      await close();
    }
  });
});
