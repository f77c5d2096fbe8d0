/**
 * =============================================================================
 * ERROR MIDDLEWARE - Unit Tests
 * =============================================================================
 */

import express from 'express';
import { asyncHandler, errorHandler, notFoundHandler } from '../shared/middleware/error.middleware';
import { NavigatorError, NavigatorErrorKind, ValidationError } from '../core/errors/AppError';
import { startTestServer, TestServer } from './support/test-server';

jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

let server: TestServer;

beforeAll(async () => {
  const app = express();

  app.get('/navigator-error', asyncHandler(async () => {
    throw new NavigatorError(NavigatorErrorKind.TEXT_GENERATION_UNAVAILABLE, 'AI service unavailable');
  }));
  app.get('/validation-error', asyncHandler(async () => {
    throw new ValidationError('Invalid request data', [{ field: 'latitude', message: 'Required' }]);
  }));
  app.get('/async-crash', asyncHandler(async () => {
    throw new Error('connection pool exhausted');
  }));
  app.get('/sync-crash', () => {
    throw new Error('boom');
  });
  app.use(notFoundHandler);
  app.use(errorHandler);

  server = await startTestServer(app);
});

afterAll(async () => {
  await server.close();
});

async function get(path: string): Promise<{ status: number; body: unknown }> {
  const response = await fetch(`${server.baseUrl}${path}`);
  return { status: response.status, body: await response.json() };
}

describe('errorHandler', () => {
  it('sends the status, code and details of a NavigatorError', async () => {
    const { status, body } = await get('/navigator-error');

    expect(status).toBe(503);
    expect(body).toMatchObject({
      success: false,
      error: {
        code: 'NAV_9004',
        message: 'AI service unavailable',
        details: { kind: 'TextGenerationUnavailable' },
      },
    });
  });

  it('sends field errors for a ValidationError', async () => {
    const { status, body } = await get('/validation-error');

    expect(status).toBe(400);
    expect(body).toMatchObject({
      error: {
        code: 'VALIDATION_ERROR',
        details: { fields: [{ field: 'latitude', message: 'Required' }] },
      },
    });
  });

  it('turns unexpected async errors into a 500', async () => {
    const { status, body } = await get('/async-crash');

    expect(status).toBe(500);
    expect(body).toMatchObject({
      success: false,
      error: { code: 'INTERNAL_ERROR', message: 'connection pool exhausted' },
    });
  });

  it('turns unexpected sync errors into a 500', async () => {
    const { status, body } = await get('/sync-crash');

    expect(status).toBe(500);
    expect(body).toMatchObject({ error: { code: 'INTERNAL_ERROR', message: 'boom' } });
  });
});

describe('notFoundHandler', () => {
  it('names the method and path', async () => {
    const { status, body } = await get('/missing/page');

    expect(status).toBe(404);
    expect(body).toMatchObject({ error: { code: 'NOT_FOUND', message: 'Cannot GET /missing/page' } });
  });
});
