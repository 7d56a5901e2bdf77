import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import type { FastifyInstance } from 'fastify';

import { buildTestApp } from '../helpers/build-test-app';

describe('core http', () => {
  let app: FastifyInstance;
  let close: () => Promise<void>;

  beforeAll(async () => {
    ({ app, close } = await buildTestApp());
  });

  afterAll(async () => {
    await close();
  });

  it('GET /health reports service identity and echoes the request id', async () => {
    const res = await app.inject({
      method: 'GET',
      url: '/health',
      headers: { 'x-request-id': 'req-00000001' },
    });

    expect(res.statusCode).toBe(200);
    expect(res.headers['x-request-id']).toBe('req-00000001');
    expect(res.json()).toEqual({
      ok: true,
      env: 'test',
      service: 'user-directory-backend',
      requestId: 'req-00000001',
    });
  });

  it('mints a request id when the inbound one is unusable', async () => {
    const res = await app.inject({
      method: 'GET',
      url: '/health',
      headers: { 'x-request-id': 'bad id!' },
    });

    const requestId = res.json<{ requestId: string }>().requestId;
    expect(requestId).toMatch(/^[0-9a-f-]{36}$/);
    expect(res.headers['x-request-id']).toBe(requestId);
  });

  it('answers unknown routes with a structured 404', async () => {
    const res = await app.inject({ method: 'GET', url: '/nope' });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: { code: 'NOT_FOUND', message: 'Route not found' } });
  });

  it('allows the configured browser origin', async () => {
    const res = await app.inject({
      method: 'GET',
      url: '/health',
      headers: { origin: 'http://localhost:5173' },
    });

    expect(res.headers['access-control-allow-origin']).toBe('http://localhost:5173');
  });

  it('does not allow other origins', async () => {
    const res = await app.inject({
      method: 'GET',
      url: '/health',
      headers: { origin: 'http://evil.test' },
    });

    expect(res.headers['access-control-allow-origin']).toBeUndefined();
  });
});
