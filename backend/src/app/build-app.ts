/**
 * backend/src/app/build-app.ts
 *
 * WHY:
 * - Single place that assembles the runnable Fastify app:
 *   config -> deps -> server -> routes
 * - Makes E2E tests simple (build once, app.inject, close).
 *
 * RULES:
 * - No business logic here (only composition).
 * - No request handlers here (those belong in routes/modules).
 */

import type { AppConfig } from './config';
import { buildDeps } from './di';
import { buildServer } from './server';
import { registerRoutes } from './routes';
import { runDevSeed } from '../shared/db/seed/dev-seed';
import { logger } from '../shared/logger/logger';
import type { UserStore } from '../modules/users/user.store';

export async function buildApp(config: AppConfig, overrides: { userStore?: UserStore } = {}) {
  const deps = buildDeps(config, overrides);
  const app = await buildServer({ config });

  registerRoutes(app, { config, deps });

  // DEV-only seed bootstrap
  if (config.seed.enabled) {
    const flow = 'seed.dev';

    if (config.nodeEnv === 'production') {
      logger.warn('seed.skipped_in_production', { flow });
    } else {
      logger.info('seed.start', { flow });

      const inserted = await runDevSeed({ userService: deps.users.userService });

      logger.info('seed.done', { flow, inserted });
    }
  }

  const close = async () => {
    await app.close();
    await deps.close();
  };

  return { app, deps, close };
}
