import { describe, it, expect } from 'vitest';
import request from 'supertest';
import express from 'express';
import { z } from 'zod';
import { errorHandler } from '../middleware/errorHandler.js';
import { ConflictError, NotFoundError, StoreError } from '../../../application/errors.js';

function appThrowing(error: unknown): express.Application {
  const app = express();
  app.get('/boom', () => {
    throw error;
  });
  app.use(errorHandler);
  return app;
}

class PayloadTooLargeError extends Error {
  readonly status = 413;
}

describe('errorHandler', () => {
  it('treats a schema failure that escaped validation as a server error', async () => {
    const result = z.object({ name: z.string() }).safeParse({});
    const error = result.success ? new Error('unexpected') : result.error;

    const response = await request(appThrowing(error)).get('/boom');

    expect(response.status).toBe(500);
    expect(response.body).toEqual({
      error: 'Internal Server Error',
      message: 'Something went wrong on the server.',
    });
  });

  it('keeps the bare message body for not found', async () => {
    const response = await request(appThrowing(new NotFoundError())).get('/boom');

    expect(response.status).toBe(404);
    expect(response.body).toEqual({ message: 'User not found' });
  });

  it('maps conflicts to 409', async () => {
    const response = await request(appThrowing(new ConflictError('taken'))).get('/boom');

    expect(response.status).toBe(409);
    expect(response.body).toEqual({ error: 'Conflict', message: 'taken' });
  });

  it('hides the driver error behind the store message', async () => {
    const error = new StoreError('Failed to retrieve users.', {
      cause: new Error('relation "users" does not exist'),
    });

    const response = await request(appThrowing(error)).get('/boom');

    expect(response.status).toBe(500);
    expect(response.body).toEqual({ error: 'Database Error', message: 'Failed to retrieve users.' });
  });

  it('passes through client error statuses set by other middleware', async () => {
    const response = await request(appThrowing(new PayloadTooLargeError('request entity too large'))).get(
      '/boom'
    );

    expect(response.status).toBe(413);
    expect(response.body).toEqual({ error: 'Bad Request', message: 'request entity too large' });
  });

  it('falls back to a generic 500', async () => {
    const response = await request(appThrowing(new Error('kaboom'))).get('/boom');

    expect(response.status).toBe(500);
    expect(response.body).toEqual({
      error: 'Internal Server Error',
      message: 'Something went wrong on the server.',
    });
  });
});
