import express, { Express } from 'express';
import request from 'supertest';
import { globalErrorHandler, asyncHandler } from '../errors/errorHandler';
import { throwApiError, isApiError } from '../errors/apiError';
import { parseRequest, sanitizationErrorHandler } from '../errors/validationErrors';
import { ConflictError, ValidationError } from '../../engine/records/errors';
import { z } from 'zod';

/**
 * ============================================================================
 * UNIT TESTS: isApiError() Type Guard
 * ============================================================================
 */

describe('isApiError() type guard', () => {
  test('returns true for errors carrying errorCode and statusCode', () => {
    const error = Object.assign(new Error(), { errorCode: 'INVALID_REQUEST', statusCode: 400 });
    expect(isApiError(error)).toBe(true);
  });

  test('returns true for record service errors', () => {
    expect(isApiError(new ConflictError('lost race'))).toBe(true);
  });

  test('returns false for Error without errorCode', () => {
    expect(isApiError(new Error('Something went wrong'))).toBe(false);
  });

  test('returns false for plain objects and primitives', () => {
    expect(isApiError({ errorCode: 'INVALID_REQUEST', statusCode: 400 })).toBe(false);
    expect(isApiError(null)).toBe(false);
    expect(isApiError('error')).toBe(false);
  });

  test('returns false for wrong field types', () => {
    expect(isApiError(Object.assign(new Error(), { errorCode: 123, statusCode: '500' }))).toBe(false);
  });
});

/**
 * ============================================================================
 * UNIT TESTS: throwApiError() and parseRequest()
 * ============================================================================
 */

describe('throwApiError()', () => {
  test('thrown error has the canonical properties', () => {
    expect(() => throwApiError('TEST_ERROR', 418)).toThrow(
      expect.objectContaining({ errorCode: 'TEST_ERROR', statusCode: 418, name: 'ApiError' }),
    );
  });
});

describe('parseRequest()', () => {
  const schema = z.object({ name: z.string() }).strict();

  beforeEach(() => {
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('returns parsed data', () => {
    expect(parseRequest(schema, { name: 'x' }, 'body')).toEqual({ name: 'x' });
  });

  test('logs issues by path and throws INVALID_REQUEST', () => {
    expect(() => parseRequest(schema, { name: 1 }, 'body')).toThrow(
      expect.objectContaining({ errorCode: 'INVALID_REQUEST', statusCode: 400 }),
    );
    expect(console.warn).toHaveBeenCalledWith('[VALIDATION_ERROR]', {
      source: 'body',
      details: { name: ['Expected string, received number'] },
    });
  });
});

/**
 * ============================================================================
 * INTEGRATION TESTS: Express error handlers
 * ============================================================================
 */

describe('globalErrorHandler', () => {
  let app: Express;

  beforeEach(() => {
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);

    app = express();
    app.use(express.json());
    app.get(
      '/api-error',
      asyncHandler(async () => {
        throwApiError('JOB_NOT_AVAILABLE', 404);
      }),
    );
    app.get(
      '/validation',
      asyncHandler(async () => {
        throw new ValidationError([{ code: 'InvalidTags', field: 'tags', message: 'Tags cannot be empty' }]);
      }),
    );
    app.get(
      '/crash',
      asyncHandler(async () => {
        throw new Error('connection to db-1 refused');
      }),
    );
    app.post('/echo', (req, res) => {
      res.json(req.body);
    });
    app.use(sanitizationErrorHandler);
    app.use(globalErrorHandler);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('serializes only the error code', async () => {
    await request(app).get('/api-error').expect(404, { errorCode: 'JOB_NOT_AVAILABLE' });
  });

  test('validation errors are 400 and logged as warnings', async () => {
    await request(app).get('/validation').expect(400, { errorCode: 'INVALID_REQUEST' });
    expect(console.warn).toHaveBeenCalledWith('[VALIDATION_ERROR]', {
      rejections: [{ code: 'InvalidTags', field: 'tags', message: 'Tags cannot be empty' }],
    });
  });

  test('unknown errors are a generic 500', async () => {
    const response = await request(app).get('/crash').expect(500);
    expect(response.body).toEqual({ errorCode: 'INTERNAL_ERROR' });
  });

  test('body parser failures are a 400', async () => {
    await request(app)
      .post('/echo')
      .set('Content-Type', 'application/json')
      .send('{oops')
      .expect(400, { errorCode: 'INVALID_REQUEST' });
  });
});
