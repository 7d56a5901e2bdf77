/**
 * src/shared/db/migrations/index.ts
 *
 * WHY:
 * - Static list of migrations so the migrator needs no filesystem scanning.
 *
 * RULES:
 * - Keys are migration names; Kysely runs them in key order.
 * - Append only. Never rename or edit an applied migration.
 */

import type { Migration } from 'kysely';

import * as m0001 from './0001_users';

export const migrations: Record<string, Migration> = {
  '0001_users': m0001,
};
