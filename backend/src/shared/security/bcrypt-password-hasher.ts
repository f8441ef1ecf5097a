/**
 * backend/src/shared/security/bcrypt-password-hasher.ts
 *
 * WHY:
 * - Bcrypt embeds its salt and cost in the output, so verify() needs nothing but the hash.
 * - Keeps bcrypt behind PasswordHasher; nothing else imports it.
 *
 * HOW TO USE:
 * - const hasher = new BcryptPasswordHasher({ cost: 12 })
 * - const hash = await hasher.hash('secret')
 * - const ok = await hasher.verify('secret', hash)
 *
 * RULES:
 * - Cost must be an integer in MIN_BCRYPT_COST..MAX_BCRYPT_COST; checked in the constructor.
 * - Tests may use MIN_BCRYPT_COST to keep runs fast.
 */

import bcrypt from 'bcryptjs';
import type { PasswordHasher } from './password-hasher';

// Bounds shared with BCRYPT_COST in app/config.ts.
export const MIN_BCRYPT_COST = 4;
export const MAX_BCRYPT_COST = 15;
const DEFAULT_BCRYPT_COST = 12;

export class BcryptPasswordHasher implements PasswordHasher {
  private readonly cost: number;

  constructor(opts?: { cost?: number }) {
    const cost = opts?.cost ?? DEFAULT_BCRYPT_COST;
    if (!Number.isInteger(cost) || cost < MIN_BCRYPT_COST || cost > MAX_BCRYPT_COST) {
      throw new RangeError(
        `bcrypt cost must be an integer between ${MIN_BCRYPT_COST} and ${MAX_BCRYPT_COST}`,
      );
    }
    this.cost = cost;
  }

  async hash(plain: string): Promise<string> {
    const salt = await bcrypt.genSalt(this.cost);
    return bcrypt.hash(plain, salt);
  }

  async verify(plain: string, hash: string): Promise<boolean> {
    return bcrypt.compare(plain, hash);
  }
}
