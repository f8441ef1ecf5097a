/**
 * backend/src/modules/users/user.types.ts
 *
 * WHY:
 * - Domain types for the Users module.
 * - The attribute allow-list is spelled out here; find/update validate caller
 *   keys against it instead of reflecting over the table.
 *
 * RULES:
 * - Keep aligned with DB schema.
 * - Avoid leaking DB naming (snake_case) outside DAL/queries.
 */

export type UserId = number;

export type User = {
  id: UserId;
  email: string;
  hashedPassword: string;
  sessionId: string | null;
  resetToken: string | null;
};

export const USER_ATTRIBUTES = ['id', 'email', 'hashedPassword', 'sessionId', 'resetToken'] as const;

export type UserAttribute = (typeof USER_ATTRIBUTES)[number];

/** Conjunction of equality checks; `null` matches SQL NULL. Undefined entries are ignored. */
export type UserCriteria = Partial<User>;

export type UserUpdate = Partial<User>;

export type FindUserResult = { found: true; user: User } | { found: false };

export function isUserAttribute(key: string): key is UserAttribute {
  return USER_ATTRIBUTES.some((attr) => attr === key);
}
