import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import type express from 'express';
import { createApp } from '../app.js';
import {
  createMemoryDatabase,
  TEST_RATE_LIMITS,
  trackConnections,
  unreachablePool,
} from '../../../test/memoryDb.js';

describe('Routing', () => {
  let app: express.Application;

  beforeEach(async () => {
    const { pool } = await createMemoryDatabase();
    app = createApp({ pool, rateLimits: TEST_RATE_LIMITS });
  });

  it('answers unknown paths with the generic 404', async () => {
    const response = await request(app).get('/nowhere');

    expect(response.status).toBe(404);
    expect(response.body).toEqual({
      error: 'Not Found',
      message: 'The requested URL was not found on the server.',
    });
  });

  it.each([
    ['delete', '/users', 'GET, POST'],
    ['post', '/user/1', 'GET, PUT, DELETE'],
    ['post', '/search', 'GET'],
    ['get', '/login', 'POST'],
  ] as const)('answers %s %s with 405', async (method, path, allow) => {
    const response = await request(app)[method](path);

    expect(response.status).toBe(405);
    expect(response.headers.allow).toBe(allow);
    expect(response.body).toEqual({
      error: 'Method Not Allowed',
      message: 'The method is not allowed for the requested URL.',
    });
  });

  it.each(['get', 'put', 'delete', 'post'] as const)(
    'answers %s on a non-numeric user id with the generic 404',
    async (method) => {
      const response = await request(app)[method]('/user/abc');

      expect(response.status).toBe(404);
      expect(response.body.error).toBe('Not Found');
    }
  );

  it('does not advertise the framework', async () => {
    const response = await request(app).get('/');

    expect(response.headers['x-powered-by']).toBeUndefined();
  });

  it('echoes the caller request id', async () => {
    const response = await request(app).get('/').set('x-request-id', 'req-123');

    expect(response.headers['x-request-id']).toBe('req-123');
  });
});

describe('Store boundary', () => {
  it('validates payloads before touching an unreachable store', async () => {
    const app = createApp({ pool: unreachablePool, rateLimits: TEST_RATE_LIMITS });

    const invalid = await request(app).post('/users').send({ name: 'Alice' });
    const valid = await request(app)
      .post('/users')
      .send({ name: 'Alice', email: 'alice@example.com', password: 'password123' });

    expect(invalid.status).toBe(400);
    expect(valid.status).toBe(500);
    expect(valid.body).toEqual({ error: 'Database Error', message: 'Failed to create user.' });
  });

  it('returns every connection it checks out', async () => {
    const { pool } = await createMemoryDatabase();
    const tracked = trackConnections(pool);
    const app = createApp({ pool: tracked.pool, rateLimits: TEST_RATE_LIMITS });

    await request(app)
      .post('/users')
      .send({ name: 'Alice', email: 'alice@example.com', password: 'password123' });
    await request(app)
      .post('/users')
      .send({ name: 'Alice', email: 'alice@example.com', password: 'password123' });
    await request(app).get('/user/1');
    await request(app).get('/user/2');
    await request(app).put('/user/1').send({ name: 'Alicia' });
    await request(app).delete('/user/2');
    await request(app).get('/search').query({ name: 'ali' });
    await request(app).post('/login').send({ email: 'alice@example.com', password: 'wrong-one' });
    await request(app).get('/healthz');

    expect(tracked.stats.acquired).toBe(9);
    expect(tracked.stats.released).toBe(9);
  });
});
