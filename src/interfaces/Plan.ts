import { RiderId } from "./Rider";
import { OrderId } from "./DeliveryOrder";

/**
 * Rider id -> ordered order ids (insertion order is delivery order).
 * Keys are exactly the riders known to the plan.
 *
 * Plans are values: operations return a new map and never mutate
 * the sequences of the plan they were given.
 */
export type Plan = ReadonlyMap<RiderId, readonly OrderId[]>;

export interface RiderAssignment {
  riderId: RiderId;
  orderIds: OrderId[];
}

/**
 * JSON-friendly form of a plan, riders sorted by id
 */
export interface PlanSnapshot {
  riders: RiderAssignment[];
}

export interface PlanSummary {
  riderCount: number;
  orderCount: number;
  minLoad: number;
  maxLoad: number;
  spread: number; // maxLoad - minLoad
  fair: boolean; // spread <= 1
}
