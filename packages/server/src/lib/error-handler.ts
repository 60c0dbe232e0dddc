import type { Context } from 'hono';
import { ApiError, type ErrorCode } from './errors.js';
import { createLogger } from './logger.js';

const logger = createLogger('error-handler');

/**
 * Error response format
 */
interface ErrorResponse {
  error: string;
  code?: ErrorCode;
}

/**
 * Format error response based on error type
 */
function handleError(c: Context, error: unknown): Response {
  if (error instanceof ApiError) {
    // Log API errors at warn level (expected errors)
    logger.warn(
      {
        method: c.req.method,
        path: c.req.path,
        status: error.statusCode,
        code: error.code,
        message: error.message,
      },
      'API error'
    );
    const body: ErrorResponse = {
      error: error.message,
      code: error.code,
    };
    return c.json(body, error.statusCode);
  }

  // Log unexpected errors at error level
  logger.error(
    { method: c.req.method, path: c.req.path, err: error },
    'Unexpected error'
  );

  // Store and queue failures surface as a generic 500
  const body: ErrorResponse = { error: 'Internal server error', code: 'InternalError' };
  return c.json(body, 500);
}

/**
 * Hono's onError handler.
 * Used with app.onError()
 */
export function onApiError(error: Error, c: Context): Response {
  return handleError(c, error);
}
