/**
 * =============================================================================
 * ERROR HANDLING MIDDLEWARE
 * =============================================================================
 *
 * Centralized error handling for all JSON routes.
 *
 * SECURITY:
 * - Stack traces never reach clients
 * - Internal error messages are hidden in production
 * - All errors are logged server-side
 * =============================================================================
 */

import { Request, Response, NextFunction } from 'express';
import { logger } from '../services/logger.service';
import { isOperationalError, ErrorResponse } from '../../core/errors/AppError';
import { ErrorCode, HTTP_STATUS } from '../../core/constants';
import { config } from '../../config/environment';

function errorBody(code: string, message: string): ErrorResponse {
  return {
    success: false,
    error: { code, message, timestamp: new Date().toISOString() }
  };
}

/**
 * Global error handler middleware
 * Must be the last middleware in the chain
 */
export function errorHandler(
  error: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (isOperationalError(error)) {
    logger.warn(`Request failed: ${error.message}`, {
      code: error.code,
      path: req.path,
      method: req.method
    });
    res.status(error.statusCode).json(error.toJSON());
    return;
  }

  // Malformed JSON body (raised by express.json before any handler runs)
  if ('type' in error && error.type === 'entity.parse.failed') {
    res.status(HTTP_STATUS.BAD_REQUEST).json(errorBody(ErrorCode.VALIDATION_ERROR, 'Malformed JSON body'));
    return;
  }

  logger.error('Request error', {
    error: error.message,
    stack: error.stack,
    path: req.path,
    method: req.method,
    ip: req.ip
  });

  // SECURITY: Never expose internal error details to client in production
  res.status(HTTP_STATUS.INTERNAL_ERROR).json(errorBody(
    ErrorCode.INTERNAL_ERROR,
    config.isProduction
      ? 'An unexpected error occurred. Please try again later.'
      : error.message
  ));
}

/**
 * Async route wrapper to catch async errors.
 * The returned promise settles once the handler (or next) has run.
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
) {
  return (req: Request, res: Response, next: NextFunction): Promise<void> =>
    Promise.resolve(fn(req, res, next)).then(() => undefined, (error: unknown) => next(error));
}

/**
 * Not found error handler
 */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(HTTP_STATUS.NOT_FOUND).json(errorBody(ErrorCode.NOT_FOUND, `Cannot ${req.method} ${req.path}`));
}
