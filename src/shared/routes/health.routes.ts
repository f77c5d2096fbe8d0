/**
 * =============================================================================
 * HEALTH CHECK ROUTES
 * =============================================================================
 *
 * ENDPOINTS:
 * - GET /health          - Quick health check (for load balancers)
 * - GET /health/live     - Liveness probe (is the process running?)
 * - GET /health/ready    - Readiness probe (can a full plan be produced?)
 *
 * Readiness only looks at local configuration. Overpass and OSRM are public
 * services and are not probed from here.
 * =============================================================================
 */

import { Router, Request, Response } from 'express';
import { geminiService, TextGenerator } from '../services/gemini.service';
import { config } from '../../config/environment';
import { HTTP_STATUS } from '../../core/constants';

// Track server start time
const startTime = Date.now();

export function createHealthRouter(generator: TextGenerator): Router {
  const router = Router();

  /**
   * Basic health check - returns 200 if the server is running
   */
  router.get('/health', (_req: Request, res: Response) => {
    res.status(HTTP_STATUS.OK).json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      environment: config.nodeEnv
    });
  });

  /**
   * Liveness probe
   */
  router.get('/health/live', (_req: Request, res: Response) => {
    res.status(HTTP_STATUS.OK).json({
      status: 'alive',
      pid: process.pid,
      uptime: Math.floor((Date.now() - startTime) / 1000)
    });
  });

  /**
   * Readiness probe - without a text generator every plan fails at the advisory stage
   */
  router.get('/health/ready', (_req: Request, res: Response) => {
    const checks = {
      textGeneration: generator.isAvailable()
    };
    const ready = Object.values(checks).every(Boolean);

    res.status(ready ? HTTP_STATUS.OK : HTTP_STATUS.SERVICE_UNAVAILABLE).json({
      status: ready ? 'ready' : 'not_ready',
      checks,
      timestamp: new Date().toISOString()
    });
  });

  return router;
}

export const healthRoutes = createHealthRouter(geminiService);
