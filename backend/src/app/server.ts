/**
 * backend/src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * HOW TO USE:
 * - Called from app/build-app.ts; module routes are added by app/routes.ts.
 */

import Fastify from 'fastify';
import cors from '@fastify/cors';

import type { AppConfig } from './config';
import { logger } from '../shared/logger/logger';
import { registerRequestContext } from '../shared/http/request-context';
import { registerErrorHandler } from '../shared/http/error-handler';

export async function buildServer(opts: { config: AppConfig }) {
  const app = Fastify({
    logger: false, // we use our own Winston logger
  });

  await app.register(cors, {
    origin: opts.config.corsOrigins,
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
  });

  registerRequestContext(app);
  registerErrorHandler(app);

  app.addHook('onRequest', (req, _reply, done) => {
    logger.info('request', {
      method: req.method,
      url: req.url,
      requestId: req.requestContext.requestId,
    });
    done();
  });

  return app;
}
