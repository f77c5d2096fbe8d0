/**
 * =============================================================================
 * EXPRESS APPLICATION
 * =============================================================================
 *
 * Builds the app without listening, so tests can drive it in-process.
 *
 * ROUTES:
 * ┌──────────────────────────────┬──────────────────────────────────────────┐
 * │ GET  /                       │ Evacuation form                          │
 * │ POST /                       │ Form submit → map, steps, advisory       │
 * │ POST /api/v1/evacuation/plan │ Full plan as JSON                        │
 * │ POST /api/v1/evacuation/route│ Annotated route as JSON                  │
 * │ GET  /health[/live|/ready]   │ Health checks                            │
 * │ GET  /static/*               │ Map script and stylesheet                │
 * └──────────────────────────────┴──────────────────────────────────────────┘
 * =============================================================================
 */

import path from 'path';
import express, { Express } from 'express';
import cors from 'cors';
import compression from 'compression';

import { config } from './config/environment';
import { API_PREFIX } from './core/constants';
import { errorHandler, notFoundHandler } from './shared/middleware/error.middleware';
import { requestLogger } from './shared/middleware/request-logger.middleware';
import { requestIdMiddleware, securityHeaders, sanitizeInput } from './shared/middleware/security.middleware';
import { healthRoutes } from './shared/routes/health.routes';
import { navigatorApiRouter, navigatorPageRouter } from './modules/navigator';

export const PUBLIC_DIR = path.join(__dirname, '..', 'public');

export function createApp(): Express {
  const app = express();

  // Rate limiting keys on the client IP behind one reverse proxy
  app.set('trust proxy', 1);

  // Request ID for tracking (must be first)
  app.use(requestIdMiddleware);

  app.use(compression({
    level: 6,
    threshold: 1024,
    filter: (req, res) => {
      if (req.headers['x-no-compression']) return false;
      return compression.filter(req, res);
    }
  }));

  if (config.security.enableHeaders) {
    app.use(securityHeaders);
  }

  app.use(cors({
    origin: config.cors.origin,
    methods: ['GET', 'POST'],
    allowedHeaders: ['Content-Type', 'X-Request-ID'],
    maxAge: 86400
  }));

  app.use(express.json({ limit: '100kb' }));
  app.use(express.urlencoded({ extended: false, limit: '100kb' }));
  app.use(sanitizeInput);

  if (config.security.enableRequestLogging) {
    app.use(requestLogger);
  }

  // ===========================================================================
  // ROUTES
  // ===========================================================================

  app.use('/static', express.static(PUBLIC_DIR, { maxAge: config.isProduction ? '1d' : 0 }));
  app.use('/', healthRoutes);
  app.use(`${API_PREFIX}/evacuation`, navigatorApiRouter);
  app.use('/', navigatorPageRouter);

  // ===========================================================================
  // ERROR HANDLING
  // ===========================================================================

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
