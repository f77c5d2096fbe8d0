/**
 * =============================================================================
 * OVERPASS SERVICE - Emergency resources from OpenStreetMap
 * =============================================================================
 *
 * Finds OSM nodes tagged `emergency=<category>` around a point.
 * Default category is `assembly_point` (evacuation gathering places).
 *
 * Results are returned in the order Overpass sends them; there is no
 * ranking and no caching.
 * =============================================================================
 */

import { z } from 'zod';
import { logger } from './logger.service';
import { requestJson } from '../utils/http.utils';
import { Result, ok, fail } from '../types/result.types';
import { NavigatorError, NavigatorErrorKind } from '../../core/errors/AppError';
import { config } from '../../config/environment';

// =============================================================================
// TYPES
// =============================================================================

export interface OverpassConfig {
  url: string;
  timeoutMs: number;
}

export interface ResourceQuery {
  latitude: number;
  longitude: number;
  radiusMeters: number;
  category: string;
}

export interface EmergencyResource {
  id: number;
  latitude: number;
  longitude: number;
  name: string;
}

export interface ResourceLookupClient {
  findResources(query: ResourceQuery): Promise<Result<EmergencyResource[], NavigatorError>>;
}

export const DEFAULT_RESOURCE_NAME = 'Emergency Shelter';

const overpassResponseSchema = z.object({
  elements: z.array(z.object({
    id: z.number(),
    lat: z.number(),
    lon: z.number(),
    tags: z.record(z.string()).optional(),
  })),
});

// =============================================================================
// OVERPASS SERVICE CLASS
// =============================================================================

export class OverpassService implements ResourceLookupClient {
  constructor(private readonly options: OverpassConfig) {}

  /**
   * Overpass QL for nodes of one emergency category within a radius
   */
  buildQuery(query: ResourceQuery): string {
    return [
      '[out:json];',
      `node[emergency=${query.category}](around:${query.radiusMeters},${query.latitude},${query.longitude});`,
      'out body;',
    ].join('\n');
  }

  async findResources(query: ResourceQuery): Promise<Result<EmergencyResource[], NavigatorError>> {
    const startTime = Date.now();
    const response = await requestJson(this.options.url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams({ data: this.buildQuery(query) }).toString(),
      timeoutMs: this.options.timeoutMs,
    });

    if (!response.ok) {
      logger.warn(`Overpass lookup failed: ${response.error.detail}`, { reason: response.error.reason });
      return fail(new NavigatorError(
        NavigatorErrorKind.RESOURCE_LOOKUP_FAILED,
        `Map data error: failed to fetch resources (${response.error.detail})`,
        { reason: response.error.reason }
      ));
    }

    const parsed = overpassResponseSchema.safeParse(response.value);
    if (!parsed.success) {
      logger.warn('Overpass returned an unexpected payload', { issues: parsed.error.errors.length });
      return fail(new NavigatorError(
        NavigatorErrorKind.RESOURCE_LOOKUP_FAILED,
        'Map data error: invalid response from server'
      ));
    }

    const resources = parsed.data.elements.map(element => ({
      id: element.id,
      latitude: element.lat,
      longitude: element.lon,
      name: element.tags?.name || DEFAULT_RESOURCE_NAME,
    }));

    logger.debug(`📍 Overpass: ${resources.length} ${query.category} node(s) - ${Date.now() - startTime}ms`);

    if (resources.length === 0) {
      return fail(new NavigatorError(
        NavigatorErrorKind.NO_RESOURCES_FOUND,
        'No emergency shelters found in your area!',
        { radiusMeters: query.radiusMeters, category: query.category }
      ));
    }

    return ok(resources);
  }
}

export const overpassService = new OverpassService(config.overpass);
