/**
 * backend/src/modules/users/user.types.ts
 *
 * WHY:
 * - Domain types for the Users module.
 *
 * RULES:
 * - Keep aligned with DB schema.
 * - Avoid leaking DB naming (snake_case) outside DAL/queries.
 * - id and createdAt are assigned by the store, never by callers.
 */

export type UserId = number;

export type User = {
  id: UserId;
  name: string;
  email: string;
  phone: string | null;

  createdAt: Date;
};

/** Writable fields, already validated and normalized. */
export type UserInput = {
  name: string;
  email: string;
  phone: string | null;
};

export type UserSearchFilter = {
  name?: string;
  email?: string;
};

export type RecentUsersFilter = {
  limit: number;
  since?: Date;
};
