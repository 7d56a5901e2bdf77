/**
 * backend/src/modules/users/user.module.ts
 *
 * WHY:
 * - Encapsulates Users module wiring: store -> service -> controller -> routes.
 *
 * RULES:
 * - No infra creation here (DI passes the store in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';
import type { Logger } from '../../shared/logger/logger';

import type { UserStore } from './user.store';
import { UserService } from './user.service';
import { UserController } from './user.controller';
import { registerUserRoutes } from './user.routes';

export type UserModule = ReturnType<typeof createUserModule>;

export function createUserModule(deps: { store: UserStore; logger: Logger }) {
  const userService = new UserService({
    store: deps.store,
    logger: deps.logger,
  });

  const controller = new UserController(userService);

  return {
    userService,
    registerRoutes(app: FastifyInstance) {
      registerUserRoutes(app, controller);
    },
  };
}
