/**
 * backend/src/shared/http/request-context.ts
 *
 * WHY:
 * - Every request gets a stable requestId for logs and debugging.
 * - Services receive it explicitly so their log lines join the request trace.
 *
 * HOW TO USE:
 * - Registered once in app/server.ts via registerRequestContext(app).
 * - After registration, every request has `req.requestContext`.
 *
 * RULES:
 * - An inbound `x-request-id` header is honoured when it looks sane; otherwise a UUID is minted.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { randomUUID } from 'node:crypto';

export type RequestContext = {
  requestId: string;
};

declare module 'fastify' {
  interface FastifyRequest {
    requestContext: RequestContext;
  }
}

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._-]{8,128}$/;

function resolveRequestId(raw: unknown): string {
  if (typeof raw === 'string' && REQUEST_ID_PATTERN.test(raw)) return raw;
  return randomUUID();
}

export function registerRequestContext(app: FastifyInstance) {
  // We decorate the request so TypeScript + Fastify know the property exists.
  // The real value is assigned on each request in the onRequest hook.
  app.decorateRequest('requestContext', null as unknown as RequestContext);

  app.addHook('onRequest', (req: FastifyRequest, reply, done) => {
    const requestId = resolveRequestId(req.headers['x-request-id']);

    req.requestContext = { requestId };
    reply.header('x-request-id', requestId);

    done();
  });
}
