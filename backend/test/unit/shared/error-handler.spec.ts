import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Fastify, { type FastifyInstance } from 'fastify';

import { registerErrorHandler, buildErrorResponse } from '../../../src/shared/http/error-handler';
import { registerRequestContext } from '../../../src/shared/http/request-context';
import { AppError } from '../../../src/shared/http/errors';

describe('registerErrorHandler', () => {
  let app: FastifyInstance;

  beforeEach(async () => {
    app = Fastify({ logger: false });
    registerRequestContext(app);
    registerErrorHandler(app);

    app.get('/app-error', () => {
      throw new AppError({
        code: 'DUPLICATE_EMAIL',
        status: 400,
        message: 'A user with this email already exists',
        meta: { secret: 'test-secret' },
      });
    });
    app.get('/boom', () => {
      throw new Error('db password test-secret leaked');
    });
    app.post('/echo', (req) => req.body);

    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  it('maps AppError to its status and code without meta', async () => {
    const res = await app.inject({ method: 'GET', url: '/app-error' });

    expect(res.statusCode).toBe(400);
    expect(res.body).toBe(
      JSON.stringify(buildErrorResponse('DUPLICATE_EMAIL', 'A user with this email already exists')),
    );
  });

  it('hides unexpected errors behind a generic 500', async () => {
    const res = await app.inject({ method: 'GET', url: '/boom' });

    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({ error: { code: 'INTERNAL', message: 'Internal server error' } });
  });

  it('turns framework client errors into VALIDATION_ERROR', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/echo',
      headers: { 'content-type': 'application/json' },
      payload: '{',
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: { code: 'VALIDATION_ERROR', message: 'Invalid request' } });
  });

  it('answers unknown routes with NOT_FOUND', async () => {
    const res = await app.inject({ method: 'DELETE', url: '/missing' });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: { code: 'NOT_FOUND', message: 'Route not found' } });
  });
});
