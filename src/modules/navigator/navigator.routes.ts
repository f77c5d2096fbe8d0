/**
 * =============================================================================
 * NAVIGATOR MODULE - ROUTES
 * =============================================================================
 *
 * Page:
 * GET  /                       - Request form
 * POST /                       - Submit form, render plan
 *
 * API:
 * POST /evacuation/plan        - Full plan (lookup → route → advisory)
 * POST /evacuation/route       - Route between two points only
 * =============================================================================
 */

import { Router } from 'express';
import { navigatorController } from './navigator.controller';
import {
  createPlanningRateLimiter,
  planningRateLimiter,
} from '../../shared/middleware/rate-limiter.middleware';

export const navigatorPageRouter = Router();

// Browsers get the page back when limited, not the JSON envelope
const formRateLimiter = createPlanningRateLimiter({ handler: navigatorController.rateLimited });

/**
 * @route   GET /
 * @desc    Render the evacuation form
 * @access  Public
 */
navigatorPageRouter.get('/', navigatorController.showForm);

/**
 * @route   POST /
 * @desc    Plan an evacuation from the submitted form
 * @access  Public (rate limited)
 */
navigatorPageRouter.post('/', formRateLimiter, navigatorController.submitForm);

export const navigatorApiRouter = Router();

/**
 * @route   POST /api/v1/evacuation/plan
 * @desc    Plan an evacuation: nearest assembly point, route, advisory
 * @access  Public (rate limited)
 */
navigatorApiRouter.post('/plan', planningRateLimiter, navigatorController.plan);

/**
 * @route   POST /api/v1/evacuation/route
 * @desc    Annotated route between two coordinates
 * @access  Public (rate limited)
 */
navigatorApiRouter.post('/route', planningRateLimiter, navigatorController.route);
