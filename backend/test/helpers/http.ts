export function readJson<T>(res: { json: () => unknown }): T {
  // inject().json() is typed loosely; pin the expected shape per test.
  return res.json() as T;
}

export const FORM_HEADERS = { 'content-type': 'application/x-www-form-urlencoded' } as const;

export function form(fields: Record<string, string>): string {
  return new URLSearchParams(fields).toString();
}

/** Extracts the session id from a `Set-Cookie: session_id=...; ...` header. */
export function readSessionCookie(setCookie: unknown): string {
  const header = Array.isArray(setCookie) ? setCookie[0] : setCookie;
  if (typeof header !== 'string') throw new Error('Set-Cookie header missing');

  const match = /^session_id=([^;]*)/.exec(header);
  if (!match || match[1] === undefined) throw new Error(`No session_id in: ${header}`);
  return match[1];
}
