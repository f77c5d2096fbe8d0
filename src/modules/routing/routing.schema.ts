/**
 * =============================================================================
 * ROUTING MODULE - SCHEMAS & TYPES
 * =============================================================================
 *
 * KEY CONCEPTS:
 * - RawRouteStep: one step exactly as OSRM returns it
 * - RouteStep: the same step after blockage simulation
 * - RouteResult: totals + annotated steps + the still-encoded polyline
 *
 * BLOCKAGES ARE SIMULATED: the table below is the only source of
 * "closed" roads. Nothing is detected from live data.
 * =============================================================================
 */

import { z } from 'zod';
import { coordinatesSchema } from '../../shared/utils/validation.utils';
import { DISASTER_TYPES } from '../../core/constants';

// =============================================================================
// BLOCKAGE SIMULATION
// =============================================================================

/**
 * Roads treated as impassable, keyed by lower-cased disaster type.
 * Road names are matched exactly (case-sensitive) against OSRM step names.
 */
export const BLOCKAGE_TABLE: ReadonlyMap<string, ReadonlySet<string>> = new Map([
  ['flood', new Set(['Main Street', 'River Road'])],
  ['fire', new Set(['Forest Highway', 'Mountain Pass'])],
  ['earthquake', new Set(['Bridge Approach', 'Tunnel Road'])],
]);

export const SERVICE_LANE_ALTERNATIVE = 'Use Service Lane';
export const UNNAMED_ROAD = 'Unnamed Road';

// =============================================================================
// OSRM RESPONSE (Input)
// =============================================================================

export const osrmManeuverSchema = z.object({
  type: z.string(),
  modifier: z.string().optional(),
  instruction: z.string().optional(),
});

export const osrmStepSchema = z.object({
  distance: z.number(),
  duration: z.number(),
  name: z.string().optional(),
  maneuver: osrmManeuverSchema,
});

export const osrmRouteSchema = z.object({
  distance: z.number(),
  duration: z.number(),
  geometry: z.string(),
  legs: z.array(z.object({
    steps: z.array(osrmStepSchema),
  })).min(1),
});

/** Just enough to read the status before validating the rest */
export const osrmEnvelopeSchema = z.object({
  code: z.string(),
  message: z.string().optional(),
  routes: z.array(z.unknown()).optional(),
});

export type RawRouteStep = z.infer<typeof osrmStepSchema>;
export type OsrmManeuver = z.infer<typeof osrmManeuverSchema>;

// =============================================================================
// ANNOTATED ROUTE (Output)
// =============================================================================

export interface RouteStep {
  /** Human-readable directive, e.g. "Turn left onto Oak Ave" */
  instruction: string;

  distanceMeters: number;

  durationSeconds: number;

  /** OSRM road name, or "Unnamed Road" */
  roadName: string;

  /** Road is in the blockage table for the current disaster */
  blocked: boolean;

  /** "Use Service Lane" when blocked, otherwise null */
  alternative: string | null;
}

export interface RouteResult {
  totalDistanceMeters: number;
  totalDurationSeconds: number;
  steps: RouteStep[];
  /** Encoded polyline of the full geometry (decoded by the presentation layer) */
  polyline: string;
}

// =============================================================================
// REQUEST SCHEMA
// =============================================================================

export const disasterTypeSchema = z.enum(DISASTER_TYPES);

/**
 * POST /api/v1/evacuation/route
 */
export const routeRequestSchema = z.object({
  from: coordinatesSchema,
  to: coordinatesSchema,
  disasterType: disasterTypeSchema,
});

export type RouteRequest = z.infer<typeof routeRequestSchema>;
