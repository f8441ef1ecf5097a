/**
 * backend/src/shared/security/token.ts
 *
 * WHY:
 * - Session ids and password-reset tokens are both opaque random identifiers.
 * - One generator keeps their strength identical.
 *
 * HOW TO USE:
 * - const sessionId = generateOpaqueId()
 */

import { randomUUID } from 'node:crypto';

// UUID v4: 122 random bits from the CSPRNG.
export function generateOpaqueId(): string {
  return randomUUID();
}
