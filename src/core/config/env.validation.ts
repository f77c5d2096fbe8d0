/**
 * =============================================================================
 * ENVIRONMENT VALIDATION
 * =============================================================================
 *
 * Validates environment variables at startup.
 * Fails fast if configuration is invalid - better than runtime errors.
 *
 * USAGE:
 * ```typescript
 * // At application startup (server.ts)
 * validateAndLogEnvironment(); // Exits in production if invalid
 * ```
 *
 * =============================================================================
 */

import { logger } from '../../shared/services/logger.service';

/**
 * Environment variable definition
 */
interface EnvVar {
  name: string;
  required: boolean;
  default?: string;
  validator?: (value: string) => boolean;
  description: string;
}

const isPositiveInt = (v: string): boolean => !isNaN(parseInt(v, 10)) && parseInt(v, 10) > 0;
const isHttpUrl = (v: string): boolean => /^https?:\/\/\S+$/.test(v);
const isInRange = (min: number, max: number) => (v: string): boolean => {
  const n = parseFloat(v);
  return !isNaN(n) && n >= min && n <= max;
};

const ENV_VARS: EnvVar[] = [
  // ==========================================================================
  // SERVER
  // ==========================================================================
  {
    name: 'NODE_ENV',
    required: false,
    default: 'development',
    validator: (v) => ['development', 'staging', 'production', 'test'].includes(v),
    description: 'Application environment'
  },
  {
    name: 'PORT',
    required: false,
    default: '3000',
    validator: (v) => isPositiveInt(v) && parseInt(v, 10) < 65536,
    description: 'Server port number'
  },

  // ==========================================================================
  // UPSTREAM SERVICES
  // ==========================================================================
  {
    name: 'OVERPASS_API_URL',
    required: false,
    default: 'https://overpass-api.de/api/interpreter',
    validator: isHttpUrl,
    description: 'Overpass interpreter endpoint'
  },
  {
    name: 'OSRM_API_URL',
    required: false,
    default: 'http://router.project-osrm.org',
    validator: isHttpUrl,
    description: 'OSRM routing server base URL'
  },
  {
    name: 'RESOURCE_SEARCH_RADIUS_M',
    required: false,
    default: '5000',
    validator: isPositiveInt,
    description: 'Search radius for emergency resources (meters)'
  },
  {
    name: 'UPSTREAM_TIMEOUT_MS',
    required: false,
    default: '15000',
    validator: isPositiveInt,
    description: 'Timeout for each outbound call (ms)'
  },

  // ==========================================================================
  // TEXT GENERATION
  // ==========================================================================
  {
    name: 'GEMINI_API_KEY',
    required: false,
    description: 'Gemini API key (safety advisory is unavailable without it)'
  },
  {
    name: 'ADVISORY_TEMPERATURE',
    required: false,
    default: '0.3',
    validator: isInRange(0, 2),
    description: 'Sampling temperature for the safety advisory'
  },
  {
    name: 'ADVISORY_MAX_TOKENS',
    required: false,
    default: '600',
    validator: isPositiveInt,
    description: 'Maximum advisory length in tokens'
  },

  // ==========================================================================
  // FORM DEFAULTS
  // ==========================================================================
  {
    name: 'DEFAULT_LATITUDE',
    required: false,
    default: '12.9716',
    validator: isInRange(-90, 90),
    description: 'Latitude pre-filled in the form'
  },
  {
    name: 'DEFAULT_LONGITUDE',
    required: false,
    default: '77.5946',
    validator: isInRange(-180, 180),
    description: 'Longitude pre-filled in the form'
  },

  // ==========================================================================
  // RATE LIMITING
  // ==========================================================================
  {
    name: 'RATE_LIMIT_WINDOW_MS',
    required: false,
    default: '60000',
    validator: isPositiveInt,
    description: 'Rate limit window in milliseconds'
  },
  {
    name: 'RATE_LIMIT_MAX_REQUESTS',
    required: false,
    default: '30',
    validator: isPositiveInt,
    description: 'Maximum planning requests per window'
  },

  // ==========================================================================
  // LOGGING
  // ==========================================================================
  {
    name: 'LOG_LEVEL',
    required: false,
    default: 'debug',
    validator: (v) => ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'].includes(v),
    description: 'Logging level'
  }
];

/**
 * Validation result
 */
export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
  loaded: Record<string, string>;
}

/**
 * Validate all environment variables against `env`
 */
export function validateEnvironment(env: NodeJS.ProcessEnv = process.env): ValidationResult {
  const result: ValidationResult = {
    valid: true,
    errors: [],
    warnings: [],
    loaded: {}
  };

  const isProduction = env.NODE_ENV === 'production';

  for (const envVar of ENV_VARS) {
    const value = env[envVar.name];

    if (envVar.required && !value) {
      result.valid = false;
      result.errors.push(`Missing required environment variable: ${envVar.name} - ${envVar.description}`);
      continue;
    }

    const finalValue = value || envVar.default;
    if (!finalValue) continue;

    if (envVar.validator && !envVar.validator(finalValue)) {
      result.valid = false;
      result.errors.push(`Invalid value for ${envVar.name}: "${finalValue}" - ${envVar.description}`);
      continue;
    }

    result.loaded[envVar.name] = envVar.name === 'GEMINI_API_KEY' ? '[SET]' : finalValue;
  }

  if (!env.GEMINI_API_KEY) {
    result.warnings.push('GEMINI_API_KEY is not set - every plan will fail at the safety advisory stage');
  }

  if (isProduction && (!env.CORS_ORIGIN || env.CORS_ORIGIN === '*')) {
    result.warnings.push('CORS_ORIGIN is "*" - this should be restricted in production');
  }

  return result;
}

/**
 * Validate and log results at startup
 * Exits process if validation fails in production
 */
export function validateAndLogEnvironment(): void {
  const result = validateEnvironment();
  const isProduction = process.env.NODE_ENV === 'production';

  result.errors.forEach(error => {
    logger.error(`Environment validation error: ${error}`);
  });

  result.warnings.forEach(warning => {
    logger.warn(`Environment validation warning: ${warning}`);
  });

  if (result.valid) {
    logger.info('✅ Environment validation passed', {
      mode: process.env.NODE_ENV || 'development',
      port: result.loaded.PORT,
      overpass: result.loaded.OVERPASS_API_URL,
      osrm: result.loaded.OSRM_API_URL,
    });
  }

  if (!result.valid && isProduction) {
    logger.error('Environment validation failed in production. Exiting.');
    process.exit(1);
  }
}
