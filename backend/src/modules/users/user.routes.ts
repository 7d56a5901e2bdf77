/**
 * backend/src/modules/users/user.routes.ts
 *
 * WHY:
 * - Declares Users module endpoints.
 * - Keeps routing separate from controller logic.
 *
 * RULES:
 * - No business logic here.
 * - Static paths (/users/search, /users/count, ...) win over /users/:id in Fastify's router.
 */

import type { FastifyInstance } from 'fastify';
import type { UserController } from './user.controller';

export function registerUserRoutes(app: FastifyInstance, controller: UserController) {
  app.get('/users', controller.listUsers.bind(controller));
  app.post('/users', controller.createUser.bind(controller));

  app.get('/users/search', controller.searchUsers.bind(controller));
  app.get('/users/count', controller.countUsers.bind(controller));
  app.get('/users/recent', controller.recentUsers.bind(controller));
  app.get('/users/by-phone', controller.usersByPhone.bind(controller));

  app.get('/users/:id', controller.getUser.bind(controller));
  app.put('/users/:id', controller.updateUser.bind(controller));
  app.delete('/users/:id', controller.deleteUser.bind(controller));
}
