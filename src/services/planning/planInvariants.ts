/**
 * Read-only views over a plan: enumerations, load statistics and
 * invariant checks. Selection logic is computed from these sorted views,
 * never from map iteration order.
 */

import { Plan, PlanSummary } from "../../interfaces/Plan";
import { RiderId } from "../../interfaces/Rider";
import { OrderId } from "../../interfaces/DeliveryOrder";
import { InvalidPlanError } from "../../errors/DispatchError";

export interface PlanViolation {
  orderId: OrderId;
  riderIds: RiderId[]; // One entry per occurrence
  message: string;
}

export interface LoadSpread {
  min: number;
  max: number;
  spread: number;
}

const ascending = (a: number, b: number): number => a - b;

/**
 * Every order id in the plan, in rider insertion order
 */
export function planOrderIds(plan: Plan): OrderId[] {
  const orderIds: OrderId[] = [];
  for (const sequence of plan.values()) {
    for (const orderId of sequence) {
      orderIds.push(orderId);
    }
  }
  return orderIds;
}

export function sortedRiderIds(plan: Plan): RiderId[] {
  return [...plan.keys()].sort(ascending);
}

/**
 * Ascending, de-duplicated order ids
 */
export function sortedOrderIds(plan: Plan): OrderId[] {
  return [...new Set(planOrderIds(plan))].sort(ascending);
}

export function findRiderForOrder(
  plan: Plan,
  orderId: OrderId
): RiderId | undefined {
  for (const riderId of sortedRiderIds(plan)) {
    if (plan.get(riderId)?.includes(orderId)) {
      return riderId;
    }
  }
  return undefined;
}

export function loadSpread(plan: Plan): LoadSpread {
  if (plan.size === 0) {
    return { min: 0, max: 0, spread: 0 };
  }

  let min = Infinity;
  let max = 0;
  for (const sequence of plan.values()) {
    min = Math.min(min, sequence.length);
    max = Math.max(max, sequence.length);
  }
  return { min, max, spread: max - min };
}

/**
 * Any two riders' loads differ by at most one
 */
export function isFair(plan: Plan): boolean {
  return loadSpread(plan).spread <= 1;
}

/**
 * Orders held more than once, across riders or within one sequence
 */
export function findInvariantViolations(plan: Plan): PlanViolation[] {
  const holders = new Map<OrderId, RiderId[]>();

  for (const riderId of sortedRiderIds(plan)) {
    for (const orderId of plan.get(riderId) ?? []) {
      const riders = holders.get(orderId) ?? [];
      riders.push(riderId);
      holders.set(orderId, riders);
    }
  }

  const violations: PlanViolation[] = [];
  for (const [orderId, riderIds] of holders) {
    if (riderIds.length > 1) {
      violations.push({
        orderId,
        riderIds,
        message: `Order ${orderId} is held ${riderIds.length} times (riders ${riderIds.join(", ")})`,
      });
    }
  }

  return violations.sort((a, b) => a.orderId - b.orderId);
}

export function assertValidPlan(plan: Plan): void {
  const violations = findInvariantViolations(plan);
  if (violations.length > 0) {
    throw new InvalidPlanError(
      `Plan holds ${violations.length} duplicated order(s)`,
      violations
    );
  }
}

export function summarizePlan(plan: Plan): PlanSummary {
  const { min, max, spread } = loadSpread(plan);
  return {
    riderCount: plan.size,
    orderCount: planOrderIds(plan).length,
    minLoad: min,
    maxLoad: max,
    spread,
    fair: spread <= 1,
  };
}
