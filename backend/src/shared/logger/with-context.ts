/**
 * backend/src/shared/logger/with-context.ts
 *
 * WHY:
 * - Request logs should carry the requestId so a full request can be traced.
 * - Handlers should not repeat the same fields manually.
 *
 * HOW TO USE:
 * - In a request handler: `withRequestContext(req).info('msg', { flow: '...' })`
 */

import type { FastifyRequest } from 'fastify';
import { logger } from './logger';

type LogMeta = Record<string, unknown>;

export function withRequestContext(req: FastifyRequest) {
  const base = {
    requestId: req.requestContext?.requestId,
    method: req.method,
    url: req.url,
  };

  return {
    info: (msg: string, meta: LogMeta = {}) => logger.info(msg, { ...base, ...meta }),
    warn: (msg: string, meta: LogMeta = {}) => logger.warn(msg, { ...base, ...meta }),
    error: (msg: string, meta: LogMeta = {}) => logger.error(msg, { ...base, ...meta }),
    debug: (msg: string, meta: LogMeta = {}) => logger.debug(msg, { ...base, ...meta }),
  };
}
