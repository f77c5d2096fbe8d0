/**
 * =============================================================================
 * ROUTING SERVICE - Route assembly
 * =============================================================================
 *
 * One OSRM call → validated response → annotated steps.
 *
 * OUTCOMES:
 * - transport error / timeout / HTTP error   → RouteServiceUnavailable
 * - OSRM code other than "Ok", or no routes  → NoRouteFound (steps never annotated)
 * - body not JSON / expected fields missing  → InvalidRouteFormat
 *
 * The polyline is passed through still encoded; decoding happens where the
 * path is drawn.
 * =============================================================================
 */

import { logger } from '../../shared/services/logger.service';
import { osrmService, RoutingClient } from '../../shared/services/osrm.service';
import { HttpFailure } from '../../shared/utils/http.utils';
import { Result, ok, fail } from '../../shared/types/result.types';
import { Coordinates } from '../../shared/types/api.types';
import { NavigatorError, NavigatorErrorKind } from '../../core/errors/AppError';
import { annotateSteps } from './route-annotation.helper';
import { osrmEnvelopeSchema, osrmRouteSchema, RouteResult } from './routing.schema';

export type StepAnnotator = typeof annotateSteps;

function noRouteFound(code: string, message?: string): NavigatorError {
  return new NavigatorError(NavigatorErrorKind.NO_ROUTE_FOUND, 'No route found', {
    routingCode: code,
    ...(message && { routingMessage: message }),
  });
}

export class RoutingService {
  constructor(
    private readonly client: RoutingClient,
    private readonly annotate: StepAnnotator = annotateSteps
  ) {}

  async planRoute(
    start: Coordinates,
    end: Coordinates,
    disasterType: string
  ): Promise<Result<RouteResult, NavigatorError>> {
    const response = await this.client.fetchRoute(start, end);

    if (!response.ok) {
      return fail(this.mapTransportFailure(response.error));
    }

    const envelope = osrmEnvelopeSchema.safeParse(response.value);
    if (!envelope.success) {
      logger.warn('OSRM response has no status code');
      return fail(new NavigatorError(NavigatorErrorKind.INVALID_ROUTE_FORMAT, 'Invalid route data format'));
    }

    if (envelope.data.code !== 'Ok' || envelope.data.routes?.length === 0) {
      logger.info(`No route between points (OSRM code: ${envelope.data.code})`);
      return fail(noRouteFound(envelope.data.code, envelope.data.message));
    }

    const route = osrmRouteSchema.safeParse(envelope.data.routes?.[0]);
    if (!route.success) {
      const missing = route.error.errors.map(issue => issue.path.join('.'));
      logger.warn('OSRM route is missing expected fields', { missing });
      return fail(new NavigatorError(
        NavigatorErrorKind.INVALID_ROUTE_FORMAT,
        'Invalid route data format',
        { missing }
      ));
    }

    const steps = this.annotate(route.data.legs[0].steps, disasterType);
    const blockedCount = steps.filter(step => step.blocked).length;

    logger.info(`🚦 Route planned: ${(route.data.distance / 1000).toFixed(1)} km, ${steps.length} steps, ${blockedCount} blocked`, {
      disasterType,
    });

    return ok({
      totalDistanceMeters: route.data.distance,
      totalDurationSeconds: route.data.duration,
      steps,
      polyline: route.data.geometry,
    });
  }

  private mapTransportFailure(failure: HttpFailure): NavigatorError {
    if (failure.reason === 'parse') {
      return new NavigatorError(NavigatorErrorKind.INVALID_ROUTE_FORMAT, 'Invalid route data format');
    }

    // OSRM answers NoRoute/NoSegment with a 4xx and a JSON status body
    if (failure.reason === 'status') {
      const envelope = osrmEnvelopeSchema.safeParse(failure.body);
      if (envelope.success && envelope.data.code !== 'Ok') {
        return noRouteFound(envelope.data.code, envelope.data.message);
      }
    }

    logger.warn(`OSRM unavailable: ${failure.detail}`, { reason: failure.reason });
    return new NavigatorError(
      NavigatorErrorKind.ROUTE_SERVICE_UNAVAILABLE,
      `Routing service error: ${failure.detail}`,
      { reason: failure.reason, ...(failure.status !== undefined && { status: failure.status }) }
    );
  }
}

export const routingService = new RoutingService(osrmService);
