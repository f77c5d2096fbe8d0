/**
 * =============================================================================
 * REQUEST LOGGER MIDDLEWARE
 * =============================================================================
 *
 * One line per request, written when the response finishes. Planning
 * handlers record how the pipeline ended (`Planned` or the failure kind) so
 * the line says why a plan was not produced, not only the status.
 *
 * Request bodies are never logged: descriptions may hold personal details.
 * =============================================================================
 */

import { Request, Response, NextFunction } from 'express';
import { logger } from '../services/logger.service';

export const PLANNED_OUTCOME = 'Planned';

const OUTCOME_LOCAL = 'planOutcome';

/**
 * Remember how the planning pipeline ended for this response
 */
export function recordPlanOutcome(res: Response, outcome: string): void {
  res.locals[OUTCOME_LOCAL] = outcome;
}

function planOutcome(res: Response): string | undefined {
  const outcome: unknown = res.locals[OUTCOME_LOCAL];
  return typeof outcome === 'string' ? outcome : undefined;
}

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const startTime = Date.now();

  res.on('finish', () => {
    const outcome = planOutcome(res);
    const logData = {
      method: req.method,
      path: req.originalUrl.split('?')[0],
      status: res.statusCode,
      duration: `${Date.now() - startTime}ms`,
      requestId: res.getHeader('X-Request-ID'),
      ...(outcome ? { outcome } : {})
    };

    if (res.statusCode >= 500) {
      logger.error('Request failed', logData);
    } else if (res.statusCode >= 400) {
      logger.warn('Request error', logData);
    } else {
      logger.info('Request completed', logData);
    }
  });

  next();
}
