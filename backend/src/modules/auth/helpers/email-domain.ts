/**
 * backend/src/modules/auth/helpers/email-domain.ts
 *
 * Auth logs carry the email domain only, never the full address.
 * An address without `@` yields ''.
 */

export function emailDomain(email: string): string {
  const at = email.lastIndexOf('@');
  return at >= 0 ? email.slice(at + 1) : '';
}
