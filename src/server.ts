/**
 * =============================================================================
 * EMERGENCY EVACUATION NAVIGATOR - MAIN SERVER
 * =============================================================================
 *
 * Given a description of an emergency and the user's position, finds the
 * nearest assembly point, plans a driving route to it with simulated road
 * blockages, and adds safety guidance from a text-generation model.
 *
 * UPSTREAM SERVICES:
 * ┌───────────┬──────────────────────────────────────────────────────────────┐
 * │ OVERPASS  │ Nearby emergency assembly points (OpenStreetMap)             │
 * │ OSRM      │ Driving route, steps and geometry                            │
 * │ GEMINI    │ Safety advisory text                                         │
 * └───────────┴──────────────────────────────────────────────────────────────┘
 * =============================================================================
 */

import { createServer } from 'http';
import { validateAndLogEnvironment } from './core/config/env.validation';
import { config } from './config/environment';
import { logger } from './shared/services/logger.service';
import { geminiService } from './shared/services/gemini.service';
import { createApp } from './app';

// Validate environment before anything else starts
validateAndLogEnvironment();

const app = createApp();
const server = createServer(app);

server.listen(config.port, config.host, () => {
  // Three sequential upstream calls per plan, each bounded by UPSTREAM_TIMEOUT_MS
  server.requestTimeout = config.overpass.timeoutMs * 3 + 5000;
  server.keepAliveTimeout = 65000;
  server.headersTimeout = 66000;

  logger.info(`🆘 Evacuation navigator listening on http://${config.host}:${config.port}`, {
    environment: config.nodeEnv,
    advisory: geminiService.isAvailable() ? 'enabled' : 'disabled (GEMINI_API_KEY not set)'
  });
});

// Handle uncaught errors
process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection', reason);
  process.exit(1);
});

// =============================================================================
// GRACEFUL SHUTDOWN
// =============================================================================

const gracefulShutdown = (signal: string): void => {
  logger.info(`${signal} received. Starting graceful shutdown...`);

  server.close(() => {
    logger.info('HTTP server closed');
    process.exit(0);
  });

  // Force shutdown after 30 seconds
  setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    process.exit(1);
  }, 30000).unref();
};

process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));
