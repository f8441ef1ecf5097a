import { describe, it, expect } from 'vitest';
import {
  BcryptPasswordHasher,
  MAX_BCRYPT_COST,
  MIN_BCRYPT_COST,
} from '../../../../src/shared/security/bcrypt-password-hasher';

describe('BcryptPasswordHasher', () => {
  const hasher = new BcryptPasswordHasher({ cost: MIN_BCRYPT_COST });

  it('embeds the algorithm and cost in the hash', async () => {
    const hash = await hasher.hash('test-password');

    expect(hash.startsWith('$2a$04$')).toBe(true);
    expect(hash).toHaveLength(60);
  });

  it('salts every hash', async () => {
    const a = await hasher.hash('test-password');
    const b = await hasher.hash('test-password');

    expect(a).not.toBe(b);
  });

  it('verifies the matching password only', async () => {
    const hash = await hasher.hash('test-password');

    expect(await hasher.verify('test-password', hash)).toBe(true);
    expect(await hasher.verify('wrong-password', hash)).toBe(false);
  });

  it('rejects an out-of-range or fractional cost', () => {
    expect(() => new BcryptPasswordHasher({ cost: MIN_BCRYPT_COST - 1 })).toThrow(RangeError);
    expect(() => new BcryptPasswordHasher({ cost: MAX_BCRYPT_COST + 1 })).toThrow(RangeError);
    expect(() => new BcryptPasswordHasher({ cost: 4.5 })).toThrow(RangeError);
  });
});
