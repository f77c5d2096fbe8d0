/**
 * =============================================================================
 * CORE CONSTANTS - Single Source of Truth
 * =============================================================================
 *
 * All application-wide constants in one place.
 *
 * BENEFITS:
 * - No magic strings/numbers scattered in code
 * - Type safety with enums
 * =============================================================================
 */

// =============================================================================
// DISASTER TYPES
// =============================================================================

/**
 * Disaster types offered by the form (display order)
 */
export const DISASTER_TYPES = ['Flood', 'Fire', 'Earthquake', 'Tsunami', 'Other'] as const;

export type DisasterType = typeof DISASTER_TYPES[number];

/**
 * Emergency numbers shown in the page footer
 */
export const EMERGENCY_CONTACTS = [
  { label: 'National Disaster Helpline', icon: '📞', number: '1070' },
  { label: 'Fire Department', icon: '🚒', number: '101' },
  { label: 'Medical Emergency', icon: '🚑', number: '108' }
] as const;

// =============================================================================
// API CONFIGURATION
// =============================================================================

export const API_VERSION = 'v1';
export const API_PREFIX = `/api/${API_VERSION}`;

// =============================================================================
// HTTP STATUS CODES (for consistency)
// =============================================================================

export const HTTP_STATUS = {
  OK: 200,
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  TOO_MANY_REQUESTS: 429,
  INTERNAL_ERROR: 500,
  BAD_GATEWAY: 502,
  SERVICE_UNAVAILABLE: 503
} as const;

// =============================================================================
// ERROR CODES
// =============================================================================
/**
 * Application-specific error codes
 *
 * PATTERN: Hierarchical error codes
 * - 2xxx: Input errors
 * - 4xxx: Nothing found upstream (valid request, empty answer)
 * - 9xxx: Upstream/infrastructure errors
 */
export enum ErrorCode {
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  NOT_FOUND = 'NOT_FOUND',
  RATE_LIMIT_EXCEEDED = 'RATE_LIMIT_EXCEEDED',
  INTERNAL_ERROR = 'INTERNAL_ERROR',

  // Input (2xxx)
  EMPTY_INPUT = 'NAV_2001',

  // Nothing found (4xxx)
  NO_RESOURCES_FOUND = 'NAV_4001',
  NO_ROUTE_FOUND = 'NAV_4002',

  // Upstream (9xxx)
  RESOURCE_LOOKUP_FAILED = 'NAV_9001',
  ROUTE_SERVICE_UNAVAILABLE = 'NAV_9002',
  INVALID_ROUTE_FORMAT = 'NAV_9003',
  TEXT_GENERATION_UNAVAILABLE = 'NAV_9004',
  TEXT_GENERATION_ERROR = 'NAV_9005'
}
