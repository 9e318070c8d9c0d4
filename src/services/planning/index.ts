/**
 * Planning Services Export
 * Plan building, event processing and plan inspection
 */

export { buildPlan } from "./planBuilder";
export { applyEvent, applyEvents, selectTargetRider } from "./eventProcessor";
export {
  planOrderIds,
  sortedRiderIds,
  sortedOrderIds,
  findRiderForOrder,
  loadSpread,
  isFair,
  findInvariantViolations,
  assertValidPlan,
  summarizePlan,
} from "./planInvariants";
export type { PlanViolation, LoadSpread } from "./planInvariants";
export { toPlanSnapshot, fromPlanSnapshot } from "./planSnapshot";
export { resolveEvent } from "./eventResolver";
export type { EventDescriptor } from "./eventResolver";
