/**
 * Shared test data for the navigator suites
 */

import { EmergencyResource } from '../../shared/services/overpass.service';
import { RouteResult } from '../../modules/routing/routing.schema';
import { EvacuationPlan } from '../../modules/navigator/navigator.schema';

export const ORIGIN = { latitude: 12.9716, longitude: 77.5946 };

export const SHELTER: EmergencyResource = {
  id: 101,
  latitude: 12.975,
  longitude: 77.6,
  name: 'Town Hall Grounds',
};

/** Encodes (38.5, -120.2) → (40.7, -120.95) */
export const TWO_POINT_POLYLINE = '_p~iF~ps|U_ulLnnqC';

export const ROUTE: RouteResult = {
  totalDistanceMeters: 2500,
  totalDurationSeconds: 300,
  polyline: TWO_POINT_POLYLINE,
  steps: [
    {
      instruction: 'Head out on Main Street',
      distanceMeters: 1200,
      durationSeconds: 150,
      roadName: 'Main Street',
      blocked: true,
      alternative: 'Use Service Lane',
    },
    {
      instruction: 'Turn right onto Park Avenue',
      distanceMeters: 1300,
      durationSeconds: 150,
      roadName: 'Park Avenue',
      blocked: false,
      alternative: null,
    },
  ],
};

export const ADVISORY = '1. Move to higher ground now.\n2. Avoid River Road.';

export const PLAN: EvacuationPlan = {
  disasterType: 'Flood',
  origin: ORIGIN,
  destination: SHELTER,
  route: ROUTE,
  advisory: ADVISORY,
};
