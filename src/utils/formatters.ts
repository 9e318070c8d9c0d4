/**
 * Formatting utilities for log lines
 */

import { Plan, PlanSummary } from "../interfaces/Plan";
import { DispatchEvent } from "../interfaces/DispatchEvent";
import { DispatchEventType } from "../enums/DispatchEventType";
import { sortedRiderIds } from "../services/planning/planInvariants";

/**
 * Format a plan as one line, riders by ascending id
 * @returns e.g. "1:[10,40] 2:[20,50] 3:[30]"
 */
export function formatPlan(plan: Plan): string {
  if (plan.size === 0) return "(no riders)";

  return sortedRiderIds(plan)
    .map((riderId) => `${riderId}:[${(plan.get(riderId) ?? []).join(",")}]`)
    .join(" ");
}

/**
 * @returns e.g. "rider_rejected(rider=1, order=10)"
 */
export function formatEvent(event: DispatchEvent): string {
  switch (event.type) {
    case DispatchEventType.RIDER_REJECTED:
      return `${event.type}(rider=${event.riderId}, order=${event.orderId})`;
    case DispatchEventType.ORDER_CANCELED:
      return `${event.type}(order=${event.orderId})`;
  }
}

/**
 * @returns e.g. "3 riders, 5 orders, load 1-2 (fair)"
 */
export function formatPlanSummary(summary: PlanSummary): string {
  const riders = `${summary.riderCount} rider${summary.riderCount === 1 ? "" : "s"}`;
  const orders = `${summary.orderCount} order${summary.orderCount === 1 ? "" : "s"}`;
  const fairness = summary.fair ? "fair" : `spread ${summary.spread}`;

  return `${riders}, ${orders}, load ${summary.minLoad}-${summary.maxLoad} (${fairness})`;
}
