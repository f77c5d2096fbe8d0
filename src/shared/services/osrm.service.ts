/**
 * =============================================================================
 * OSRM SERVICE - Driving directions
 * =============================================================================
 *
 * Transport-only client for the OSRM `route` endpoint.
 * Shape validation and step annotation live in the routing module;
 * this class only knows how to build the URL and fetch JSON.
 *
 * NOTE: OSRM takes coordinates as `lon,lat` pairs.
 * =============================================================================
 */

import { logger } from './logger.service';
import { requestJson, HttpFailure } from '../utils/http.utils';
import { Result } from '../types/result.types';
import { Coordinates } from '../types/api.types';
import { config } from '../../config/environment';

export interface OsrmConfig {
  baseUrl: string;
  profile: string;
  timeoutMs: number;
}

export interface RoutingClient {
  fetchRoute(start: Coordinates, end: Coordinates): Promise<Result<unknown, HttpFailure>>;
}

export class OsrmService implements RoutingClient {
  constructor(private readonly options: OsrmConfig) {}

  buildRouteUrl(start: Coordinates, end: Coordinates): string {
    const base = this.options.baseUrl.replace(/\/+$/, '');
    const waypoints = `${start.longitude},${start.latitude};${end.longitude},${end.latitude}`;
    return `${base}/route/v1/${this.options.profile}/${waypoints}?overview=full`;
  }

  async fetchRoute(start: Coordinates, end: Coordinates): Promise<Result<unknown, HttpFailure>> {
    const startTime = Date.now();
    const result = await requestJson(this.buildRouteUrl(start, end), { timeoutMs: this.options.timeoutMs });
    logger.debug(`📍 OSRM route request ${result.ok ? 'completed' : `failed (${result.error.reason})`} - ${Date.now() - startTime}ms`);
    return result;
  }
}

export const osrmService = new OsrmService(config.osrm);
