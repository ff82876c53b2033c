import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { ZodError } from 'zod';
import {
  PersistenceError,
  SchemaValidationError,
  SearchwiseError,
} from '@searchwise/shared/src/utils/errors.js';
import { createChildLogger } from '@searchwise/shared/src/logger.js';
import type { AppEnv } from '../types.js';

const log = createChildLogger('api:error-handler');

interface ErrorResponse {
  readonly error: string;
  readonly code: string;
  readonly requestId: string;
  readonly details?: readonly string[];
}

export function errorHandler(err: Error, c: Context<AppEnv>): Response {
  const requestId = c.get('requestId');

  if (err instanceof ZodError) {
    const details = err.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    const body: ErrorResponse = {
      error: 'Validation failed',
      code: 'VALIDATION_ERROR',
      requestId,
      details,
    };
    return c.json(body, 400);
  }

  if (err instanceof SchemaValidationError) {
    const body: ErrorResponse = {
      error: err.message,
      code: 'VALIDATION_ERROR',
      requestId,
      details: err.validationErrors,
    };
    return c.json(body, 400);
  }

  // Malformed JSON bodies surface from the validator as HTTP exceptions.
  if (err instanceof HTTPException && err.status === 400) {
    const body: ErrorResponse = {
      error: err.message || 'Malformed request body',
      code: 'INVALID_REQUEST',
      requestId,
    };
    return c.json(body, 400);
  }

  if (err instanceof PersistenceError) {
    if (err.code === 'TRANSCRIPT_NOT_FOUND') {
      const body: ErrorResponse = { error: err.message, code: err.code, requestId };
      return c.json(body, 404);
    }
    if (err.code === 'INVALID_TRANSCRIPT_NAME') {
      const body: ErrorResponse = { error: err.message, code: err.code, requestId };
      return c.json(body, 400);
    }

    log.error({ requestId, error: err.message, code: err.code }, 'Persistence error');
    const body: ErrorResponse = {
      error: 'Internal server error',
      code: 'INTERNAL_ERROR',
      requestId,
    };
    return c.json(body, 500);
  }

  if (err instanceof SearchwiseError && err.code === 'NO_SEARCH_RESULTS') {
    const body: ErrorResponse = { error: err.message, code: err.code, requestId };
    return c.json(body, 409);
  }

  log.error({ requestId, error: err.message }, 'Unhandled error');
  const body: ErrorResponse = {
    error: 'Internal server error',
    code: 'INTERNAL_ERROR',
    requestId,
  };
  return c.json(body, 500);
}
