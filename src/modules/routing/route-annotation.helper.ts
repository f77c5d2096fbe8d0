/**
 * =============================================================================
 * ROUTE ANNOTATION HELPER
 * =============================================================================
 *
 * Turns raw OSRM steps into display-ready RouteSteps and flags the ones
 * that run over a road listed in BLOCKAGE_TABLE for the current disaster.
 *
 * Pure functions: no I/O, no shared mutable state.
 * =============================================================================
 */

import {
  BLOCKAGE_TABLE,
  SERVICE_LANE_ALTERNATIVE,
  UNNAMED_ROAD,
  OsrmManeuver,
  RawRouteStep,
  RouteStep,
} from './routing.schema';

const NO_BLOCKAGES: ReadonlySet<string> = new Set();

/**
 * Blocked road names for a disaster type (case-insensitive key)
 */
export function blockedRoadsFor(disasterType: string): ReadonlySet<string> {
  return BLOCKAGE_TABLE.get(disasterType.toLowerCase()) ?? NO_BLOCKAGES;
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

/**
 * Directive for a step whose maneuver carries no instruction text.
 * OSRM's public server only sends type/modifier, so this is the usual path.
 */
export function describeManeuver(maneuver: OsrmManeuver, roadName: string): string {
  const modifier = maneuver.modifier ? ` ${maneuver.modifier}` : '';

  switch (maneuver.type) {
    case 'depart':
      return `Head out on ${roadName}`;
    case 'arrive':
      return 'Arrive at your destination';
    case 'new name':
    case 'continue':
      return `Continue${modifier} onto ${roadName}`;
    case 'roundabout':
    case 'rotary':
      return `Enter the roundabout and exit onto ${roadName}`;
    default:
      return `${capitalize(maneuver.type)}${modifier} onto ${roadName}`;
  }
}

/**
 * Annotate steps in order. `alternative` is set exactly when `blocked` is.
 */
export function annotateSteps(rawSteps: RawRouteStep[], disasterType: string): RouteStep[] {
  const blockedRoads = blockedRoadsFor(disasterType);

  return rawSteps.map(step => {
    const roadName = step.name || UNNAMED_ROAD;
    const blocked = blockedRoads.has(roadName);

    return {
      instruction: step.maneuver.instruction || describeManeuver(step.maneuver, roadName),
      distanceMeters: step.distance,
      durationSeconds: step.duration,
      roadName,
      blocked,
      alternative: blocked ? SERVICE_LANE_ALTERNATIVE : null,
    };
  });
}
