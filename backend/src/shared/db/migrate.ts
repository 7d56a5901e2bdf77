/**
 * backend/src/shared/db/migrate.ts
 *
 * WHY:
 * - Apply schema migrations against DATABASE_URL.
 *
 * HOW TO USE:
 * - npm run db:migrate --workspace @user-directory/backend
 */

import { Migrator } from 'kysely';

import { createDb } from './db';
import { migrations } from './migrations';
import { buildConfig } from '../../app/config';
import { logger } from '../logger/logger';

async function runMigrations(): Promise<void> {
  const config = buildConfig();

  if (config.store.kind !== 'postgres') {
    logger.warn('migrations.skipped', { reason: 'USER_STORE is not postgres' });
    return;
  }

  const db = createDb(config.store.databaseUrl);

  const migrator = new Migrator({
    db,
    provider: {
      getMigrations: () => Promise.resolve(migrations),
    },
  });

  logger.info('migrations.start', { count: Object.keys(migrations).length });

  const { error, results } = await migrator.migrateToLatest();

  results?.forEach((r) => {
    if (r.status === 'Success') logger.info('migration.success', { migration: r.migrationName });
    if (r.status === 'Error') logger.error('migration.error', { migration: r.migrationName });
  });

  await db.destroy();

  if (error) {
    logger.error('migrations.failed', { err: error });
    process.exit(1);
  }

  logger.info('migrations.up_to_date');
}

void runMigrations().catch((err: unknown) => {
  logger.error('migrations.fatal', { err });
  process.exit(1);
});
