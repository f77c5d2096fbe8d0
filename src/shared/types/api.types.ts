/**
 * =============================================================================
 * API TYPES - SHARED CONTRACTS
 * =============================================================================
 *
 * Geographic primitives shared by the services, the JSON API and the page.
 * =============================================================================
 */

/**
 * Location coordinates (request side)
 */
export interface Coordinates {
  latitude: number;
  longitude: number;
}

/**
 * Decoded polyline vertex: [latitude, longitude] in degrees
 */
export type LatLng = [latitude: number, longitude: number];
