/**
 * src/shared/session/session.types.ts
 *
 * WHY:
 * - Sessions live on the user row (`users.session_id`), not in a separate store.
 *   A user holds at most one session; logging in again replaces it.
 *
 * RULES:
 * - Session cookie is HttpOnly, SameSite=Strict, Secure in production.
 * - The cookie carries only the opaque id; never user data.
 */

export const SESSION_COOKIE_NAME = 'session_id';
