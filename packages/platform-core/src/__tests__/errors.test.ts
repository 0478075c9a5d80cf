import { describe, it, expect, beforeAll, afterEach, vi } from 'vitest';
import express, { type Express } from 'express';
import request from 'supertest';
import { z } from 'zod';
import {
  DomainError,
  asyncHandler,
  createDomainServiceError,
  errorHandler,
  notFoundHandler,
} from '../error-handling/errors';
import { StoreTimeoutError, withTimeout } from '../database/withTimeout';
import { isForeignKeyViolation, isUniqueViolation, readPgCode } from '../database/pg-errors';
import { parseBody } from '../middleware/validation';
import { requestLogger } from '../logging/middleware';

const ShelfError = createDomainServiceError('Shelf', {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  NOT_FOUND: 'NOT_FOUND',
  UNAUTHORIZED: 'UNAUTHORIZED',
  FORBIDDEN: 'FORBIDDEN',
  CONFLICT: 'CONFLICT',
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const);

describe('createDomainServiceError', () => {
  it('should name the error after the domain', () => {
    const error = ShelfError.notFound('Shelf', 3);

    expect(error).toBeInstanceOf(DomainError);
    expect(error.name).toBe('ShelfError');
    expect(error.message).toBe('Shelf not found: 3');
    expect(error.statusCode).toBe(404);
  });

  it('should carry field errors on validation failures', () => {
    const error = ShelfError.validationError('author', 'Invalid pk "9" - object does not exist.');

    expect(error.statusCode).toBe(400);
    expect(error.fieldErrors).toEqual({ author: ['Invalid pk "9" - object does not exist.'] });
  });

  it('should mark unavailability as retryable', () => {
    expect(ShelfError.serviceUnavailable('postgres').retryable).toBe(true);
    expect(ShelfError.conflict('Duplicate').retryable).toBe(false);
  });
});

describe('errorHandler', () => {
  let app: Express;

  beforeAll(() => {
    app = express();
    app.use(express.json({ limit: '1kb' }));
    app.use(requestLogger('test-service'));
    app.get('/conflict', () => {
      throw ShelfError.conflict('A shelf with this name already exists.', { name: ['Must be unique.'] });
    });
    app.get(
      '/async',
      asyncHandler(async () => {
        throw ShelfError.forbidden();
      })
    );
    app.get('/boom', () => {
      throw new Error('connection string postgres://user:pw@db leaked');
    });
    app.get('/internal', () => {
      throw ShelfError.internalError('row decoder exploded');
    });
    app.get('/slow', () => {
      throw new StoreTimeoutError('book.get', 50);
    });
    app.post('/echo', (req, res) => {
      res.json(parseBody(z.object({ name: z.string().min(2, 'Too short.') }), req.body));
    });
    app.use(notFoundHandler());
    app.use(errorHandler());
  });

  it('should render domain errors as envelopes with field errors', async () => {
    const response = await request(app).get('/conflict');

    expect(response.status).toBe(409);
    expect(response.body).toMatchObject({
      message: 'A shelf with this name already exists.',
      errors: { name: ['Must be unique.'] },
      status: 'error',
      code: 'CONFLICT',
    });
  });

  it('should forward rejected async handlers', async () => {
    const response = await request(app).get('/async');

    expect(response.status).toBe(403);
    expect(response.body.message).toBe('You do not have permission to perform this action.');
  });

  it('should hide internals of unexpected errors and echo the correlation id', async () => {
    const response = await request(app).get('/boom').set('x-correlation-id', 'corr-123');

    expect(response.status).toBe(500);
    expect(response.headers['x-correlation-id']).toBe('corr-123');
    expect(response.body).toEqual({
      message: 'Internal server error',
      errors: { non_field_errors: ['Internal server error'] },
      status: 'error',
      code: 'INTERNAL_ERROR',
      correlationId: 'corr-123',
    });
  });

  it('should hide the message of non-retryable 5xx domain errors', async () => {
    const response = await request(app).get('/internal');

    expect(response.status).toBe(500);
    expect(response.body.message).toBe('Internal server error');
  });

  it('should surface store timeouts as retryable 503s', async () => {
    const response = await request(app).get('/slow');

    expect(response.status).toBe(503);
    expect(response.body).toMatchObject({
      message: 'The data store did not answer book.get within 50ms. Please retry.',
      code: 'SERVICE_UNAVAILABLE',
      retryable: true,
    });
  });

  it('should answer malformed JSON with 400', async () => {
    const response = await request(app).post('/echo').set('Content-Type', 'application/json').send('{"name":');

    expect(response.status).toBe(400);
    expect(response.body.message).toBe('Malformed request body.');
  });

  it('should answer oversized bodies with 413', async () => {
    const response = await request(app).post('/echo').send({ name: 'x'.repeat(2048) });

    expect(response.status).toBe(413);
    expect(response.body.code).toBe('PAYLOAD_TOO_LARGE');
  });

  it('should map zod issues to field errors', async () => {
    const response = await request(app).post('/echo').send({ name: 'x' });

    expect(response.status).toBe(400);
    expect(response.body).toMatchObject({
      message: 'Request body validation failed',
      errors: { name: ['Too short.'] },
      code: 'VALIDATION_ERROR',
    });
  });

  it('should pass valid bodies through', async () => {
    const response = await request(app).post('/echo').send({ name: 'Ada', extra: true });

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ name: 'Ada' });
  });

  it('should answer unknown routes with a 404 envelope', async () => {
    const response = await request(app).get('/nowhere');

    expect(response.status).toBe(404);
    expect(response.body.message).toBe('Route GET /nowhere not found');
  });
});

describe('withTimeout', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should return the result of a fast call', async () => {
    await expect(withTimeout('book.get', 100, async () => 'done')).resolves.toBe('done');
  });

  it('should reject with a retryable error when the call outlives the limit', async () => {
    vi.useFakeTimers();
    const pending = withTimeout('book.list', 100, () => new Promise<string>(() => undefined));
    const assertion = expect(pending).rejects.toBeInstanceOf(StoreTimeoutError);

    await vi.advanceTimersByTimeAsync(100);
    await assertion;
  });

  it('should pass store errors through untouched', async () => {
    const failure = ShelfError.conflict('dup');

    await expect(withTimeout('book.create', 100, () => Promise.reject(failure))).rejects.toBe(failure);
  });
});

describe('pg error codes', () => {
  it('should find the code on the error or its cause', () => {
    const driverError = Object.assign(new Error('duplicate key'), { code: '23505' });
    const wrapped = new Error('Failed query', { cause: driverError });

    expect(readPgCode(wrapped)).toBe('23505');
    expect(isUniqueViolation(wrapped)).toBe(true);
    expect(isForeignKeyViolation(wrapped)).toBe(false);
  });

  it('should ignore non-postgres codes', () => {
    expect(readPgCode(Object.assign(new Error('refused'), { code: 'ECONNREFUSED' }))).toBeUndefined();
    expect(readPgCode('23503')).toBeUndefined();
  });
});
