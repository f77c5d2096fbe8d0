/**
 * Navigator Module Exports
 */

export { navigatorApiRouter, navigatorPageRouter } from './navigator.routes';
export { navigatorService, NavigatorService } from './navigator.service';
export type { EvacuationPlan, EvacuationPlanView, PlanRequest } from './navigator.schema';
