/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (db pool) and shares them.
 * - Keeps modules testable (tests swap in the in-memory store via config).
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions (which store) belong HERE, not inside the classes.
 */

import type { AppConfig } from './config';
import { createDb } from '../shared/db/db';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import type { UserStore } from '../modules/users/user.store';
import { KyselyUserStore } from '../modules/users/dal/kysely-user.store';
import { InMemUserStore } from '../modules/users/dal/inmem-user.store';

import { createUserModule } from '../modules/users/user.module';
import type { UserModule } from '../modules/users/user.module';

export type AppDeps = {
  logger: Logger;

  userStore: UserStore;

  // modules
  users: UserModule;

  // lifecycle
  close: () => Promise<void>;
};

function createUserStore(config: AppConfig): UserStore {
  if (config.store.kind === 'postgres') {
    return new KyselyUserStore(createDb(config.store.databaseUrl));
  }

  return new InMemUserStore();
}

export function buildDeps(config: AppConfig, overrides: { userStore?: UserStore } = {}): AppDeps {
  const userStore = overrides.userStore ?? createUserStore(config);

  logger.info('deps.user_store', {
    store: overrides.userStore ? 'override' : config.store.kind,
  });

  // modules (no HTTP / no business logic here)
  const users = createUserModule({ store: userStore, logger });

  return {
    logger,
    userStore,
    users,
    close: async () => {
      await userStore.close();
    },
  };
}
