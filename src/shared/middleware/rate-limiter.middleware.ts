/**
 * =============================================================================
 * RATE LIMITER MIDDLEWARE
 * =============================================================================
 *
 * Each evacuation plan costs three upstream calls (Overpass, OSRM, Gemini),
 * so only the planning endpoints are limited. Health checks and static
 * assets are not.
 *
 * In-memory store: one process, counters reset on restart.
 * =============================================================================
 */

import rateLimit, { Options } from 'express-rate-limit';
import { config } from '../../config/environment';
import { ErrorCode } from '../../core/constants';

export const RATE_LIMIT_MESSAGE = 'Too many requests. Please try again later.';

/**
 * Planning rate limiter factory
 * RATE_LIMIT_MAX_REQUESTS per RATE_LIMIT_WINDOW_MS per IP, answered with the
 * JSON error envelope unless a `handler` is given
 */
export function createPlanningRateLimiter(overrides: Partial<Options> = {}) {
  return rateLimit({
    windowMs: config.rateLimit.windowMs,
    limit: config.rateLimit.maxRequests,
    message: {
      success: false,
      error: {
        code: ErrorCode.RATE_LIMIT_EXCEEDED,
        message: RATE_LIMIT_MESSAGE
      }
    },
    standardHeaders: true,
    legacyHeaders: false,
    skip: () => !config.security.enableRateLimiting,
    ...overrides
  });
}

export const planningRateLimiter = createPlanningRateLimiter();
