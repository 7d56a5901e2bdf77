/**
 * src/shared/db/migrations/0001_users.ts
 *
 * WHY:
 * - The users table is the whole persistent state of the app.
 * - Business rules that must hold under concurrency live in constraints:
 *   unique email, '@' in email, non-blank name.
 *
 * RULES:
 * - Keep shared/db/schema.ts aligned.
 * - Constraint names are part of the contract (users_email_key is matched by the DAL).
 */

import { sql, type Kysely } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('users')
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('name', 'varchar(100)', (col) => col.notNull())
    .addColumn('email', 'varchar(150)', (col) => col.notNull())
    .addColumn('phone', 'varchar(15)')
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addUniqueConstraint('users_email_key', ['email'])
    .addCheckConstraint('users_email_format_chk', sql`position('@' in email) > 0`)
    .addCheckConstraint('users_name_not_blank_chk', sql`length(trim(name)) > 0`)
    .execute();

  await db.schema.createIndex('users_name_idx').on('users').column('name').execute();
  await db.schema.createIndex('users_created_at_idx').on('users').column('created_at').execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('users').ifExists().execute();
}
