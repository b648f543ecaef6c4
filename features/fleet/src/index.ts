/**
 * @readycheck/fleet - Concurrent verification of a deployment's services
 */

export { FleetService, summarize, type FleetReport, type FleetStatus } from './fleet.service.js';
export { buildFleetPlan, type FleetPlan } from './plan.js';
