/**
 * backend/src/shared/security/password-hasher.ts
 *
 * Stored passwords only ever pass through this interface. The auth service
 * never sees which algorithm sits behind it.
 *
 * - hash():   fresh salt per call, so equal passwords give different hashes
 * - verify(): salt and cost are read back out of `hash`
 */

export interface PasswordHasher {
  hash(plain: string): Promise<string>;
  verify(plain: string, hash: string): Promise<boolean>;
}
