import { describe, it, expect } from 'vitest';
import { generateOpaqueId } from '../../../../src/shared/security/token';

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe('generateOpaqueId', () => {
  it('returns a UUID v4 string', () => {
    expect(generateOpaqueId()).toMatch(UUID_V4);
  });

  it('never repeats across many calls', () => {
    const ids = new Set(Array.from({ length: 1000 }, () => generateOpaqueId()));
    expect(ids.size).toBe(1000);
  });
});
