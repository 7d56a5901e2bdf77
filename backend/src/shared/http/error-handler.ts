/**
 * backend/src/shared/http/error-handler.ts
 *
 * WHY:
 * - Fastify's default error handler doesn't understand AppError.
 * - We need consistent error responses across all endpoints.
 * - Internal details (meta, stack traces) must never leak to clients.
 *
 * RESPONSIBILITIES:
 * - AppError → map .status and .code to structured HTTP response.
 * - Fastify client errors (malformed JSON, unsupported media type, oversized body) → 400.
 * - Unknown routes → 404 in the same body shape.
 * - Unexpected errors → 500 with generic message.
 * - Log all errors with request context for debugging.
 *
 * RULES:
 * - No business logic here.
 * - Never expose .meta or stack traces in responses.
 */

import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { AppError } from './errors';
import { withRequestContext } from '../logger/with-context';

export type ErrorResponseBody = {
  error: {
    code: string;
    message: string;
  };
};

export function buildErrorResponse(code: string, message: string): ErrorResponseBody {
  return { error: { code, message } };
}

function isClientFastifyError(err: FastifyError): boolean {
  return typeof err.statusCode === 'number' && err.statusCode >= 400 && err.statusCode < 500;
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((err: FastifyError, req: FastifyRequest, reply: FastifyReply) => {
    const log = withRequestContext(req);

    // 1) Known application errors
    if (err instanceof AppError) {
      log.warn('app_error', {
        flow: 'http.error',
        code: err.code,
        status: err.status,
        message: err.message,
        meta: err.meta,
      });

      return reply.status(err.status).send(buildErrorResponse(err.code, err.message));
    }

    // 2) Framework-level client errors (bad JSON, wrong content-type, ...)
    if (isClientFastifyError(err)) {
      log.warn('client_error', {
        flow: 'http.error',
        fastifyCode: err.code,
        status: err.statusCode,
        message: err.message,
      });

      return reply.status(400).send(buildErrorResponse('VALIDATION_ERROR', 'Invalid request'));
    }

    // 3) Unexpected errors: never leak internals
    log.error('unhandled_error', {
      flow: 'http.error',
      message: err.message,
      stack: err.stack,
    });

    return reply.status(500).send(buildErrorResponse('INTERNAL', 'Internal server error'));
  });

  app.setNotFoundHandler((req: FastifyRequest, reply: FastifyReply) => {
    withRequestContext(req).info('route_not_found', { flow: 'http.error' });
    return reply.status(404).send(buildErrorResponse('NOT_FOUND', 'Route not found'));
  });
}
