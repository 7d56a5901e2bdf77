/**
 * backend/src/modules/users/dal/kysely-user.store.ts
 *
 * WHY:
 * - Production UserStore: Postgres through Kysely.
 * - Composes read queries + UserRepo writes behind the UserStore contract.
 *
 * RULES:
 * - Postgres unique violations surface as UniqueViolationError (never raw pg errors).
 * - A store bound to a transaction runs nested transaction() calls inline.
 * - close() only destroys the root connection pool.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { translateUniqueViolation } from '../../../shared/db/db-errors';
import type { UserStore } from '../user.store';
import type { RecentUsersFilter, User, UserInput, UserSearchFilter } from '../user.types';
import {
  countUsers,
  getRecentUsers,
  getUserByEmail,
  getUserById,
  getUsersByPhone,
  listUsers,
  searchUsersByName,
  searchUsersByNameAndEmail,
  toUser,
  userExistsByEmail,
} from '../queries/user.queries';
import { UserRepo } from './user.repo';

export class KyselyUserStore implements UserStore {
  constructor(
    private readonly db: DbExecutor,
    private readonly repo: UserRepo = new UserRepo(db),
  ) {}

  withDb(db: DbExecutor): KyselyUserStore {
    return new KyselyUserStore(db, this.repo.withDb(db));
  }

  findAll(): Promise<User[]> {
    return listUsers(this.db);
  }

  findById(id: number): Promise<User | undefined> {
    return getUserById(this.db, id);
  }

  findByEmail(email: string): Promise<User | undefined> {
    return getUserByEmail(this.db, email);
  }

  findByNameContaining(term: string): Promise<User[]> {
    return searchUsersByName(this.db, term);
  }

  findByNameAndEmail(filter: UserSearchFilter): Promise<User[]> {
    return searchUsersByNameAndEmail(this.db, filter);
  }

  findByPhone(phone: string): Promise<User[]> {
    return getUsersByPhone(this.db, phone);
  }

  findRecent(filter: RecentUsersFilter): Promise<User[]> {
    return getRecentUsers(this.db, filter);
  }

  existsByEmail(email: string): Promise<boolean> {
    return userExistsByEmail(this.db, email);
  }

  count(): Promise<number> {
    return countUsers(this.db);
  }

  async insert(input: UserInput): Promise<User> {
    const row = await translateUniqueViolation(() => this.repo.insertUser(input));
    return toUser(row);
  }

  async update(id: number, input: UserInput): Promise<User | undefined> {
    const row = await translateUniqueViolation(() => this.repo.updateUser(id, input));
    return row ? toUser(row) : undefined;
  }

  deleteById(id: number): Promise<boolean> {
    return this.repo.deleteUser(id);
  }

  transaction<T>(fn: (store: UserStore) => Promise<T>): Promise<T> {
    if (this.db.isTransaction) return fn(this);

    return this.db.transaction().execute((trx) => fn(this.withDb(trx)));
  }

  async close(): Promise<void> {
    if (this.db.isTransaction) return;
    await this.db.destroy();
  }
}
