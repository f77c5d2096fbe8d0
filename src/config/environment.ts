/**
 * =============================================================================
 * ENVIRONMENT CONFIGURATION
 * =============================================================================
 *
 * Centralized configuration loaded from environment variables.
 * All config access goes through this file - no direct process.env usage elsewhere.
 *
 * SECURITY:
 * - The Gemini API key is never logged (see logger redaction)
 * - Missing API key disables the safety advisory instead of crashing
 *
 * FOR BACKEND DEVELOPERS:
 * - Add new config here, not scattered across the codebase
 * - Services receive their slice of this object through their constructor
 * =============================================================================
 */

import dotenv from 'dotenv';

// Load .env file
dotenv.config();

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

/**
 * Get optional environment variable with default
 */
function getOptional(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/**
 * Get boolean environment variable
 */
function getBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true';
}

/**
 * Get integer environment variable
 */
function getNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Get decimal environment variable (coordinates, sampling temperature)
 */
function getFloat(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseFloat(value);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse CORS origins from comma-separated string
 */
function parseCorsOrigins(value: string): string | string[] {
  if (value === '*') return '*';
  return value.split(',').map(origin => origin.trim()).filter(Boolean);
}

// =============================================================================
// CONFIGURATION OBJECT
// =============================================================================

const nodeEnv = getOptional('NODE_ENV', 'development');
const upstreamTimeoutMs = getNumber('UPSTREAM_TIMEOUT_MS', 15000);

export const config = {
  // Server
  nodeEnv,
  port: getNumber('PORT', 3000),
  host: getOptional('HOST', '0.0.0.0'),

  // Overpass (emergency resource lookup)
  overpass: {
    url: getOptional('OVERPASS_API_URL', 'https://overpass-api.de/api/interpreter'),
    category: getOptional('RESOURCE_CATEGORY', 'assembly_point'),
    radiusMeters: getNumber('RESOURCE_SEARCH_RADIUS_M', 5000),
    timeoutMs: upstreamTimeoutMs,
  },

  // OSRM (driving directions)
  osrm: {
    baseUrl: getOptional('OSRM_API_URL', 'http://router.project-osrm.org'),
    profile: 'driving',
    timeoutMs: upstreamTimeoutMs,
  },

  // Gemini (safety advisory text)
  gemini: {
    apiKey: getOptional('GEMINI_API_KEY', ''),
    model: getOptional('GEMINI_MODEL', 'gemini-2.5-flash'),
    temperature: getFloat('ADVISORY_TEMPERATURE', 0.3),
    maxOutputTokens: getNumber('ADVISORY_MAX_TOKENS', 600),
    timeoutMs: upstreamTimeoutMs,
  },

  // Form defaults
  defaults: {
    latitude: getFloat('DEFAULT_LATITUDE', 12.9716),
    longitude: getFloat('DEFAULT_LONGITUDE', 77.5946),
  },

  // Rate Limiting (planning endpoints only - each plan costs three upstream calls)
  rateLimit: {
    windowMs: getNumber('RATE_LIMIT_WINDOW_MS', 60 * 1000),
    maxRequests: getNumber('RATE_LIMIT_MAX_REQUESTS', 30),
  },

  // Logging
  logLevel: getOptional('LOG_LEVEL', 'debug'),

  // CORS
  cors: {
    origin: parseCorsOrigins(getOptional('CORS_ORIGIN', '*')),
  },

  // Helpers
  isProduction: nodeEnv === 'production',
  isDevelopment: nodeEnv === 'development',
  isTest: nodeEnv === 'test',

  // Security Features
  security: {
    enableHeaders: getBoolean('ENABLE_SECURITY_HEADERS', true),
    enableRateLimiting: getBoolean('ENABLE_RATE_LIMITING', true),
    enableRequestLogging: getBoolean('ENABLE_REQUEST_LOGGING', true),
  },
} as const;

