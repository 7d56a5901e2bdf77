/**
 * backend/src/modules/users/dal/user.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for users (mutations).
 *
 * RULES:
 * - No transactions started here (service owns tx).
 * - No AppError.
 * - No policies.
 * - Supports withDb() for transaction binding.
 * - Email uniqueness is enforced by the users_email_key constraint; callers translate
 *   the violation (see shared/db/db-errors.ts).
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { UserRow } from './user.query-sql';

export class UserRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): UserRepo {
    return new UserRepo(db);
  }

  /**
   * Inserts a user; id and created_at come from DB defaults.
   */
  async insertUser(params: {
    name: string;
    email: string;
    phone: string | null;
  }): Promise<UserRow> {
    return this.db
      .insertInto('users')
      .values({
        name: params.name,
        email: params.email,
        phone: params.phone,
      })
      .returningAll()
      .executeTakeFirstOrThrow();
  }

  /**
   * Overwrites the writable fields. Returns undefined when no row has `id`.
   */
  async updateUser(
    userId: number,
    params: { name: string; email: string; phone: string | null },
  ): Promise<UserRow | undefined> {
    return this.db
      .updateTable('users')
      .set({
        name: params.name,
        email: params.email,
        phone: params.phone,
      })
      .where('id', '=', userId)
      .returningAll()
      .executeTakeFirst();
  }

  /**
   * Hard delete. Returns true if a row was removed.
   */
  async deleteUser(userId: number): Promise<boolean> {
    const res = await this.db.deleteFrom('users').where('id', '=', userId).executeTakeFirst();

    return Number(res.numDeletedRows) > 0;
  }
}
