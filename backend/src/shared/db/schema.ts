/**
 * backend/src/shared/db/schema.ts
 *
 * WHY:
 * - Kysely needs a compile-time description of the tables it queries.
 * - Mirrors migrations/0001_users.ts; update both together.
 *
 * RULES:
 * - DB naming (snake_case) lives here and in DAL only.
 * - created_at is filled by the DB default and is never updated.
 */

import type { ColumnType, Generated } from 'kysely';

export interface UsersTable {
  id: Generated<number>;
  name: string;
  email: string;
  phone: string | null;
  created_at: ColumnType<Date, Date | undefined, never>;
}

export interface DB {
  users: UsersTable;
}
