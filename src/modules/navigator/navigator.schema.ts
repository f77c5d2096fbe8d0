/**
 * =============================================================================
 * NAVIGATOR MODULE - SCHEMAS & TYPES
 * =============================================================================
 *
 * Request contracts for the JSON API and the HTML form, and the shape of a
 * finished evacuation plan.
 *
 * An empty description passes validation on purpose: the pipeline reports it
 * as EmptyInput so the page and the API show the same message.
 * =============================================================================
 */

import { z } from 'zod';
import { disasterTypeSchema, RouteResult } from '../routing/routing.schema';
import { EmergencyResource } from '../../shared/services/overpass.service';
import { Coordinates, LatLng } from '../../shared/types/api.types';
import { DisasterType } from '../../core/constants';

const descriptionSchema = z.string().max(2000, 'Description cannot exceed 2000 characters');

/**
 * POST /api/v1/evacuation/plan
 */
export const planRequestSchema = z.object({
  description: descriptionSchema,
  disasterType: disasterTypeSchema,
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
});

/**
 * Text field → number, rejecting blanks (which z.coerce would turn into 0)
 */
function coordinateField(label: string, limit: number) {
  return z.string()
    .trim()
    .min(1, `${label} is required`)
    .pipe(
      z.coerce.number({ invalid_type_error: `${label} must be a number` })
        .min(-limit, `${label} must be between -${limit} and ${limit}`)
        .max(limit, `${label} must be between -${limit} and ${limit}`)
    );
}

/**
 * POST / (urlencoded form - every field arrives as a string)
 */
export const planFormSchema = z.object({
  description: descriptionSchema.default(''),
  disasterType: disasterTypeSchema,
  latitude: coordinateField('Latitude', 90),
  longitude: coordinateField('Longitude', 180),
});

/**
 * Whatever was submitted, coerced back into displayable strings
 */
export const formEchoSchema = z.object({
  description: z.string().catch(''),
  disasterType: z.string().catch(''),
  latitude: z.string().catch(''),
  longitude: z.string().catch(''),
});

export type PlanRequest = z.infer<typeof planRequestSchema>;

export interface EvacuationPlan {
  disasterType: DisasterType;
  origin: Coordinates;
  destination: EmergencyResource;
  route: RouteResult;
  /** Free text from the text generator, unparsed */
  advisory: string;
}

/**
 * What the page and the API render: the plan plus the decoded route geometry
 */
export interface EvacuationPlanView extends EvacuationPlan {
  path: LatLng[];
}
