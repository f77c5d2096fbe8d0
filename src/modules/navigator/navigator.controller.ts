/**
 * =============================================================================
 * NAVIGATOR MODULE - CONTROLLER
 * =============================================================================
 *
 * Handles HTTP requests for the page and the JSON API.
 * Controller only handles request/response - the pipeline is in the service.
 *
 * Pipeline failures are thrown to the error middleware on the API and
 * rendered into the page on the HTML form.
 * =============================================================================
 */

import { Request, Response } from 'express';
import { navigatorService, NavigatorService } from './navigator.service';
import { routingService, RoutingService } from '../routing/routing.service';
import { routeRequestSchema } from '../routing/routing.schema';
import {
  EvacuationPlan,
  EvacuationPlanView,
  formEchoSchema,
  planFormSchema,
  planRequestSchema,
} from './navigator.schema';
import { PageForm, renderPage, SUCCESS_BANNER } from './navigator.view';
import { validateSchema } from '../../shared/utils/validation.utils';
import { decodePolyline } from '../../shared/utils/polyline.utils';
import { asyncHandler } from '../../shared/middleware/error.middleware';
import { RATE_LIMIT_MESSAGE } from '../../shared/middleware/rate-limiter.middleware';
import { PLANNED_OUTCOME, recordPlanOutcome } from '../../shared/middleware/request-logger.middleware';
import { logger } from '../../shared/services/logger.service';
import { Coordinates } from '../../shared/types/api.types';
import { Result } from '../../shared/types/result.types';
import { ApiResponse, HTTP_STATUS, NavigatorError } from '../../core';
import { config } from '../../config/environment';

function recordOutcome<T>(res: Response, result: Result<T, NavigatorError>): void {
  recordPlanOutcome(res, result.ok ? PLANNED_OUTCOME : result.error.kind);
}

function withPath(plan: EvacuationPlan): EvacuationPlanView {
  return { ...plan, path: decodePolyline(plan.route.polyline) };
}

export class NavigatorController {
  constructor(
    private readonly navigator: Pick<NavigatorService, 'planEvacuation'>,
    private readonly routing: Pick<RoutingService, 'planRoute'>,
    private readonly defaults: Coordinates
  ) {}

  private defaultForm(): PageForm {
    return {
      description: '',
      disasterType: 'Flood',
      latitude: String(this.defaults.latitude),
      longitude: String(this.defaults.longitude),
    };
  }

  private echoForm(body: unknown): PageForm {
    const echo = formEchoSchema.safeParse(body);
    return echo.success ? echo.data : this.defaultForm();
  }

  private sendPage(res: Response, status: number, html: string): void {
    res.status(status).type('html').send(html);
  }

  /**
   * GET / - empty form with default coordinates
   */
  showForm = (_req: Request, res: Response): void => {
    this.sendPage(res, HTTP_STATUS.OK, renderPage({ form: this.defaultForm() }));
  };

  /**
   * POST / over the rate limit - the form again, with the limit message
   */
  rateLimited = (req: Request, res: Response): void => {
    logger.warn('Evacuation form rate limited', { requestId: req.get('x-request-id') });
    this.sendPage(
      res,
      HTTP_STATUS.TOO_MANY_REQUESTS,
      renderPage({ form: this.echoForm(req.body), error: RATE_LIMIT_MESSAGE })
    );
  };

  /**
   * POST / - run the pipeline and render the plan, or the form with an error
   */
  submitForm = asyncHandler(async (req: Request, res: Response) => {
    const form = this.echoForm(req.body);

    const parsed = planFormSchema.safeParse(req.body);
    if (!parsed.success) {
      const issue = parsed.error.errors[0];
      logger.debug('Rejected evacuation form', { field: issue.path.join('.') });
      this.sendPage(res, HTTP_STATUS.BAD_REQUEST, renderPage({ form, error: issue.message }));
      return;
    }

    const result = await this.navigator.planEvacuation(parsed.data);
    recordOutcome(res, result);
    if (!result.ok) {
      this.sendPage(res, result.error.statusCode, renderPage({ form, error: result.error.message }));
      return;
    }

    this.sendPage(res, HTTP_STATUS.OK, renderPage({ form, plan: withPath(result.value) }));
  });

  /**
   * POST /api/v1/evacuation/plan
   */
  plan = asyncHandler(async (req: Request, res: Response) => {
    const data = validateSchema(planRequestSchema, req.body);

    const result = await this.navigator.planEvacuation(data);
    recordOutcome(res, result);
    if (!result.ok) {
      throw result.error;
    }

    ApiResponse.success(res, withPath(result.value), SUCCESS_BANNER);
  });

  /**
   * POST /api/v1/evacuation/route
   */
  route = asyncHandler(async (req: Request, res: Response) => {
    const data = validateSchema(routeRequestSchema, req.body);

    const result = await this.routing.planRoute(data.from, data.to, data.disasterType);
    recordOutcome(res, result);
    if (!result.ok) {
      throw result.error;
    }

    ApiResponse.success(res, { ...result.value, path: decodePolyline(result.value.polyline) });
  });
}

export const navigatorController = new NavigatorController(navigatorService, routingService, config.defaults);
