/**
 * backend/src/shared/db/db.ts
 *
 * WHY:
 * - Central place to create the Kysely DB connection.
 * - The connection pool is the only shared mutable state of the backend.
 *
 * HOW TO USE:
 * - DI calls createDb(config.databaseUrl) once and shares the instance.
 * - DAL/query functions accept a DbExecutor (works for the main DB and for `trx`).
 */

import pg from 'pg';
import { Kysely, PostgresDialect } from 'kysely';

import type { DB } from './schema';

export type Db = Kysely<DB>;

/**
 * DbExecutor is the only DB "capability" DAL/queries should accept.
 * - Works for both main DB and transactions (Transaction<DB> extends Kysely<DB>).
 * - Prevents leaking concrete DB construction into modules.
 */
export type DbExecutor = Kysely<DB>;

export function createDb(databaseUrl: string): Db {
  const pool = new pg.Pool({
    connectionString: databaseUrl,
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
  });

  return new Kysely<DB>({
    dialect: new PostgresDialect({ pool }),
  });
}
