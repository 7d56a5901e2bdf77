/**
 * backend/src/modules/users/queries/user.queries.ts
 *
 * WHY:
 * - Queries are read-only and side-effect free.
 * - They shape DB rows into User domain types.
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 */

import type { DbExecutor } from '../../../shared/db/db';
import {
  countUsersSql,
  selectAllUsersSql,
  selectRecentUsersSql,
  selectUserByEmailSql,
  selectUserByIdSql,
  selectUserIdByEmailSql,
  selectUsersByNameAndEmailSql,
  selectUsersByNameContainingSql,
  selectUsersByPhoneSql,
} from '../dal/user.query-sql';
import type { UserRow } from '../dal/user.query-sql';
import type { RecentUsersFilter, User, UserSearchFilter } from '../user.types';

export function toUser(row: UserRow): User {
  return {
    id: row.id,
    name: row.name,
    email: row.email,
    phone: row.phone ?? null,
    createdAt: row.created_at,
  };
}

export async function listUsers(db: DbExecutor): Promise<User[]> {
  const rows = await selectAllUsersSql(db);
  return rows.map(toUser);
}

export async function getUserById(db: DbExecutor, userId: number): Promise<User | undefined> {
  const row = await selectUserByIdSql(db, userId);
  if (!row) return undefined;
  return toUser(row);
}

export async function getUserByEmail(db: DbExecutor, email: string): Promise<User | undefined> {
  const row = await selectUserByEmailSql(db, email);
  if (!row) return undefined;
  return toUser(row);
}

export async function searchUsersByName(db: DbExecutor, term: string): Promise<User[]> {
  const rows = await selectUsersByNameContainingSql(db, term);
  return rows.map(toUser);
}

export async function searchUsersByNameAndEmail(
  db: DbExecutor,
  filter: UserSearchFilter,
): Promise<User[]> {
  const rows = await selectUsersByNameAndEmailSql(db, filter);
  return rows.map(toUser);
}

export async function getUsersByPhone(db: DbExecutor, phone: string): Promise<User[]> {
  const rows = await selectUsersByPhoneSql(db, phone);
  return rows.map(toUser);
}

export async function getRecentUsers(db: DbExecutor, filter: RecentUsersFilter): Promise<User[]> {
  const rows = await selectRecentUsersSql(db, filter);
  return rows.map(toUser);
}

export async function userExistsByEmail(db: DbExecutor, email: string): Promise<boolean> {
  const row = await selectUserIdByEmailSql(db, email);
  return row !== undefined;
}

export async function countUsers(db: DbExecutor): Promise<number> {
  return countUsersSql(db);
}
