/**
 * backend/src/modules/users/user.store.ts
 *
 * WHY:
 * - The access layer the service depends on, independent of the backing engine.
 * - Postgres (KyselyUserStore) in production; InMemUserStore for local dev and tests.
 *
 * RULES:
 * - One store call = one statement. No business rules here.
 * - Writes that hit the unique email constraint throw UniqueViolationError.
 * - transaction(fn) hands fn a store bound to the transaction; commit on resolve,
 *   rollback on throw.
 */

import type { RecentUsersFilter, User, UserId, UserInput, UserSearchFilter } from './user.types';

export interface UserStore {
  findAll(): Promise<User[]>;
  findById(id: UserId): Promise<User | undefined>;
  findByEmail(email: string): Promise<User | undefined>;
  findByNameContaining(term: string): Promise<User[]>;
  findByNameAndEmail(filter: UserSearchFilter): Promise<User[]>;
  findByPhone(phone: string): Promise<User[]>;
  findRecent(filter: RecentUsersFilter): Promise<User[]>;
  existsByEmail(email: string): Promise<boolean>;
  count(): Promise<number>;

  insert(input: UserInput): Promise<User>;
  /** Returns undefined when no row has `id`. */
  update(id: UserId, input: UserInput): Promise<User | undefined>;
  /** Returns true when a row was removed. */
  deleteById(id: UserId): Promise<boolean>;

  transaction<T>(fn: (store: UserStore) => Promise<T>): Promise<T>;

  close(): Promise<void>;
}
