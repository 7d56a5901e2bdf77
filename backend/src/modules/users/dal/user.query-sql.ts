/**
 * backend/src/modules/users/dal/user.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for users (raw SQL access).
 * - One parameterized statement per operation.
 *
 * RULES:
 * - No AppError.
 * - No policies.
 * - No transactions started here.
 * - List reads have a deterministic order (id, or newest first for "recent").
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { UsersTable } from '../../../shared/db/schema';

export type UserRow = Selectable<UsersTable>;

/**
 * Wraps a term as a substring LIKE pattern, escaping LIKE wildcards so
 * "50%" matches the literal text. Postgres' default LIKE escape is backslash.
 */
export function containsPattern(term: string): string {
  return `%${term.replace(/[\\%_]/g, (ch) => `\\${ch}`)}%`;
}

export async function selectAllUsersSql(db: DbExecutor): Promise<UserRow[]> {
  return db.selectFrom('users').selectAll().orderBy('id').execute();
}

export async function selectUserByIdSql(
  db: DbExecutor,
  userId: number,
): Promise<UserRow | undefined> {
  return db.selectFrom('users').selectAll().where('id', '=', userId).executeTakeFirst();
}

export async function selectUserByEmailSql(
  db: DbExecutor,
  email: string,
): Promise<UserRow | undefined> {
  return db.selectFrom('users').selectAll().where('email', '=', email).executeTakeFirst();
}

export async function selectUsersByNameContainingSql(
  db: DbExecutor,
  term: string,
): Promise<UserRow[]> {
  return db
    .selectFrom('users')
    .selectAll()
    .where('name', 'ilike', containsPattern(term))
    .orderBy('id')
    .execute();
}

export async function selectUsersByNameAndEmailSql(
  db: DbExecutor,
  filter: { name?: string; email?: string },
): Promise<UserRow[]> {
  let query = db.selectFrom('users').selectAll();

  if (filter.name) query = query.where('name', 'ilike', containsPattern(filter.name));
  if (filter.email) query = query.where('email', 'ilike', containsPattern(filter.email));

  return query.orderBy('id').execute();
}

export async function selectUsersByPhoneSql(db: DbExecutor, phone: string): Promise<UserRow[]> {
  return db.selectFrom('users').selectAll().where('phone', '=', phone).orderBy('id').execute();
}

export async function selectRecentUsersSql(
  db: DbExecutor,
  params: { limit: number; since?: Date },
): Promise<UserRow[]> {
  let query = db.selectFrom('users').selectAll();

  if (params.since) query = query.where('created_at', '>', params.since);

  return query.orderBy('created_at', 'desc').orderBy('id', 'desc').limit(params.limit).execute();
}

export async function selectUserIdByEmailSql(
  db: DbExecutor,
  email: string,
): Promise<{ id: number } | undefined> {
  return db
    .selectFrom('users')
    .select('id')
    .where('email', '=', email)
    .limit(1)
    .executeTakeFirst();
}

export async function countUsersSql(db: DbExecutor): Promise<number> {
  const row = await db
    .selectFrom('users')
    .select((eb) => eb.fn.countAll().as('count'))
    .executeTakeFirstOrThrow();

  // pg returns count(*) as a string (bigint)
  return Number(row.count);
}
