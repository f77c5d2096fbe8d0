/**
 * =============================================================================
 * APPLICATION ERROR CLASSES
 * =============================================================================
 *
 * Standardized error handling for the entire application.
 *
 * USAGE:
 * ```typescript
 * // In a pipeline stage (returned, not thrown)
 * return fail(new NavigatorError(NavigatorErrorKind.NO_ROUTE_FOUND, 'No route found'));
 *
 * // In a route handler
 * throw new ValidationError('Invalid request data', [{ field: 'latitude', message: 'Required' }]);
 * ```
 * =============================================================================
 */

import { ErrorCode, HTTP_STATUS } from '../constants';

/**
 * Base Application Error
 * All custom errors extend this class
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: ErrorCode | string;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown>;
  public readonly timestamp: string;

  constructor(
    message: string,
    statusCode: number = HTTP_STATUS.INTERNAL_ERROR,
    code: ErrorCode | string = ErrorCode.INTERNAL_ERROR,
    isOperational: boolean = true,
    details?: Record<string, unknown>
  ) {
    super(message);

    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.details = details;
    this.timestamp = new Date().toISOString();

    Error.captureStackTrace(this, this.constructor);

    // Set prototype explicitly (TypeScript issue with extending Error)
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Convert error to JSON response format
   */
  toJSON(): ErrorResponse {
    return {
      success: false,
      error: {
        code: this.code,
        message: this.message,
        ...(this.details && { details: this.details }),
        timestamp: this.timestamp
      }
    };
  }
}

/**
 * Error response format
 */
export interface ErrorResponse {
  success: false;
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
    timestamp: string;
  };
}

// =============================================================================
// GENERIC ERROR CLASSES
// =============================================================================

export interface ValidationErrorDetail {
  field: string;
  message: string;
}

/**
 * 400 Validation Error - Schema/input validation failed
 */
export class ValidationError extends AppError {
  public readonly errors: ValidationErrorDetail[];

  constructor(
    message: string = 'Validation failed',
    errors: ValidationErrorDetail[] = []
  ) {
    super(message, HTTP_STATUS.BAD_REQUEST, ErrorCode.VALIDATION_ERROR, true, { fields: errors });
    this.errors = errors;
  }

  static fromZodError(zodError: { errors: Array<{ path: (string | number)[]; message: string }> }): ValidationError {
    const errors = zodError.errors.map(err => ({
      field: err.path.join('.'),
      message: err.message
    }));
    return new ValidationError('Invalid request data', errors);
  }
}

// =============================================================================
// DOMAIN-SPECIFIC ERRORS
// =============================================================================

/**
 * Every way an evacuation plan can fail, in pipeline order
 */
export enum NavigatorErrorKind {
  EMPTY_INPUT = 'EmptyInput',
  RESOURCE_LOOKUP_FAILED = 'ResourceLookupFailed',
  NO_RESOURCES_FOUND = 'NoResourcesFound',
  ROUTE_SERVICE_UNAVAILABLE = 'RouteServiceUnavailable',
  NO_ROUTE_FOUND = 'NoRouteFound',
  INVALID_ROUTE_FORMAT = 'InvalidRouteFormat',
  TEXT_GENERATION_UNAVAILABLE = 'TextGenerationUnavailable',
  TEXT_GENERATION_ERROR = 'TextGenerationError'
}

const KIND_MAPPING: Record<NavigatorErrorKind, { code: ErrorCode; status: number }> = {
  [NavigatorErrorKind.EMPTY_INPUT]: { code: ErrorCode.EMPTY_INPUT, status: HTTP_STATUS.BAD_REQUEST },
  [NavigatorErrorKind.RESOURCE_LOOKUP_FAILED]: { code: ErrorCode.RESOURCE_LOOKUP_FAILED, status: HTTP_STATUS.BAD_GATEWAY },
  [NavigatorErrorKind.NO_RESOURCES_FOUND]: { code: ErrorCode.NO_RESOURCES_FOUND, status: HTTP_STATUS.NOT_FOUND },
  [NavigatorErrorKind.ROUTE_SERVICE_UNAVAILABLE]: { code: ErrorCode.ROUTE_SERVICE_UNAVAILABLE, status: HTTP_STATUS.SERVICE_UNAVAILABLE },
  [NavigatorErrorKind.NO_ROUTE_FOUND]: { code: ErrorCode.NO_ROUTE_FOUND, status: HTTP_STATUS.NOT_FOUND },
  [NavigatorErrorKind.INVALID_ROUTE_FORMAT]: { code: ErrorCode.INVALID_ROUTE_FORMAT, status: HTTP_STATUS.BAD_GATEWAY },
  [NavigatorErrorKind.TEXT_GENERATION_UNAVAILABLE]: { code: ErrorCode.TEXT_GENERATION_UNAVAILABLE, status: HTTP_STATUS.SERVICE_UNAVAILABLE },
  [NavigatorErrorKind.TEXT_GENERATION_ERROR]: { code: ErrorCode.TEXT_GENERATION_ERROR, status: HTTP_STATUS.BAD_GATEWAY }
};

/**
 * A failed pipeline stage.
 * Stages return these inside a Result; controllers throw them to the error middleware.
 */
export class NavigatorError extends AppError {
  public readonly kind: NavigatorErrorKind;

  constructor(kind: NavigatorErrorKind, message: string, details?: Record<string, unknown>) {
    const { code, status } = KIND_MAPPING[kind];
    super(message, status, code, true, { kind, ...details });
    this.kind = kind;
  }
}

// =============================================================================
// ERROR TYPE GUARDS
// =============================================================================

/**
 * Check if error is an operational (expected) error
 */
export function isOperationalError(error: unknown): error is AppError {
  return error instanceof AppError && error.isOperational;
}
