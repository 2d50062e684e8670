import express from 'express';
import request from 'supertest';
import { describe, it, expect, jest } from '@jest/globals';
import { DatabaseError } from 'pg';
import { z } from 'zod';

jest.mock('@/config/logger', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

import { errorHandler, notFoundHandler, toAppError } from '@/middleware/errorHandler';
import { createRateLimiter } from '@/middleware/rateLimit';
import { BusinessLogicError, ValidationError } from '@/shared/errors';

function buildApp(): express.Express {
  const app = express();
  app.use(express.json());
  app.post('/validate', (req, _res, next) => {
    try {
      z.object({ name: z.string() }).parse(req.body);
      next(new BusinessLogicError('not reached'));
    } catch (error) {
      next(error);
    }
  });
  app.get('/business', (_req, _res, next) => next(new BusinessLogicError('Script has no lines')));
  app.get('/crash', (_req, _res, next) => next(new Error('upstream returned 429')));
  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
}

describe('toAppError', () => {
  it('passes AppErrors through', () => {
    const error = new ValidationError('bad');
    expect(toAppError(error)).toBe(error);
  });

  it('maps a malformed uuid rejected by postgres to a validation error', () => {
    const error = new DatabaseError('invalid input syntax for type uuid: "abc"', 0, 'error');
    error.code = '22P02';

    const mapped = toAppError(error);

    expect(mapped).toBeInstanceOf(ValidationError);
    expect(mapped?.statusCode).toBe(422);
    expect(mapped?.message).toBe('Invalid identifier');
  });

  it('leaves other database errors unmapped', () => {
    const error = new DatabaseError('connection terminated', 0, 'error');
    error.code = '57P01';

    expect(toAppError(error)).toBeNull();
  });

  it('returns null for unknown failures', () => {
    expect(toAppError(new Error('boom'))).toBeNull();
  });
});

describe('errorHandler', () => {
  const app = buildApp();

  it('answers AppErrors with their status and body', async () => {
    const response = await request(app).get('/business');
    expect(response.status).toBe(400);
    expect(response.body).toEqual({
      error: 'business_logic_error',
      message: 'Script has no lines',
      details: null,
    });
  });

  it('turns zod failures into validation errors with field details', async () => {
    const response = await request(app).post('/validate').send({ name: 7 });
    expect(response.status).toBe(422);
    expect(response.body.error).toBe('validation_error');
    expect(response.body.details).toEqual([{ field: 'name', message: 'Expected string, received number' }]);
  });

  it('rejects malformed JSON', async () => {
    const response = await request(app).post('/validate').set('Content-Type', 'application/json').send('{"name":');
    expect(response.status).toBe(422);
    expect(response.body.message).toBe('Invalid JSON body');
  });

  it('hides unknown errors behind a translated message', async () => {
    const response = await request(app).get('/crash');
    expect(response.status).toBe(500);
    expect(response.body).toEqual({
      error: 'internal_error',
      message: 'Rate limit exceeded. Please wait and try again.',
      details: null,
    });
  });

  it('reports unknown routes', async () => {
    const response = await request(app).get('/nowhere');
    expect(response.status).toBe(404);
    expect(response.body).toEqual({ error: 'not_found', message: 'Route not found', path: '/nowhere' });
  });
});

describe('createRateLimiter', () => {
  it('allows the limit per window and resets after a minute', async () => {
    let now = 1_000_000;
    const app = express();
    app.use(createRateLimiter(2, () => now));
    app.get('/', (_req, res) => {
      res.json({ ok: true });
    });
    app.use(errorHandler);

    expect((await request(app).get('/')).status).toBe(200);
    expect((await request(app).get('/')).status).toBe(200);

    const limited = await request(app).get('/');
    expect(limited.status).toBe(429);
    expect(limited.headers['retry-after']).toBe('60');
    expect(limited.body).toEqual({
      error: 'rate_limit_exceeded',
      message: 'Too many requests. Please try again later.',
      details: null,
    });

    now += 60_000;
    expect((await request(app).get('/')).status).toBe(200);
  });
});
