/**
 * =============================================================================
 * NAVIGATOR SERVICE - Evacuation pipeline
 * =============================================================================
 *
 * lookup → route → advisory, strictly in sequence.
 *
 * The first failing stage ends the request; later stages are never called
 * and nothing partial is returned.
 * =============================================================================
 */

import { logger } from '../../shared/services/logger.service';
import { overpassService, ResourceLookupClient } from '../../shared/services/overpass.service';
import { Result, ok, fail } from '../../shared/types/result.types';
import { NavigatorError, NavigatorErrorKind } from '../../core/errors/AppError';
import { routingService, RoutingService } from '../routing/routing.service';
import { advisoryService, AdvisoryService } from '../advisory/advisory.service';
import { config } from '../../config/environment';
import { EvacuationPlan, PlanRequest } from './navigator.schema';

export interface ResourceSearchOptions {
  radiusMeters: number;
  category: string;
}

export class NavigatorService {
  constructor(
    private readonly resources: ResourceLookupClient,
    private readonly routing: Pick<RoutingService, 'planRoute'>,
    private readonly advisory: Pick<AdvisoryService, 'generateAdvisory'>,
    private readonly search: ResourceSearchOptions
  ) {}

  async planEvacuation(request: PlanRequest): Promise<Result<EvacuationPlan, NavigatorError>> {
    if (!request.description.trim()) {
      return fail(new NavigatorError(NavigatorErrorKind.EMPTY_INPUT, 'Please describe your emergency situation'));
    }

    const origin = { latitude: request.latitude, longitude: request.longitude };
    logger.info('🚨 Evacuation plan requested', {
      disasterType: request.disasterType,
      descriptionLength: request.description.length,
    });

    // Step 1: nearby assembly points (first result wins, no ranking)
    const resources = await this.resources.findResources({
      ...origin,
      radiusMeters: this.search.radiusMeters,
      category: this.search.category,
    });
    if (!resources.ok) return resources;
    const destination = resources.value[0];

    // Step 2: driving route with simulated blockages
    const route = await this.routing.planRoute(origin, destination, request.disasterType);
    if (!route.ok) return route;

    // Step 3: safety advisory
    const advisory = await this.advisory.generateAdvisory({
      description: request.description,
      location: `${request.latitude},${request.longitude}`,
      disasterType: request.disasterType,
    });
    if (!advisory.ok) return advisory;

    logger.info(`✅ Evacuation plan ready: ${destination.name}`, { resourceId: destination.id });

    return ok({
      disasterType: request.disasterType,
      origin,
      destination,
      route: route.value,
      advisory: advisory.value,
    });
  }
}

export const navigatorService = new NavigatorService(overpassService, routingService, advisoryService, {
  radiusMeters: config.overpass.radiusMeters,
  category: config.overpass.category,
});
