import { Plan, PlanSnapshot } from "../../interfaces/Plan";
import { RiderId } from "../../interfaces/Rider";
import { OrderId } from "../../interfaces/DeliveryOrder";
import { InvalidPlanError } from "../../errors/DispatchError";
import { assertValidPlan, sortedRiderIds } from "./planInvariants";

export function toPlanSnapshot(plan: Plan): PlanSnapshot {
  return {
    riders: sortedRiderIds(plan).map((riderId) => ({
      riderId,
      orderIds: [...(plan.get(riderId) ?? [])],
    })),
  };
}

/**
 * Rebuild a plan from a snapshot supplied from outside.
 * Rider order in the snapshot becomes the plan's key order.
 *
 * @throws InvalidPlanError on a duplicated rider or order id
 */
export function fromPlanSnapshot(snapshot: PlanSnapshot): Plan {
  const plan = new Map<RiderId, readonly OrderId[]>();

  for (const { riderId, orderIds } of snapshot.riders) {
    if (plan.has(riderId)) {
      throw new InvalidPlanError(`Rider ${riderId} appears more than once`, {
        riderId,
      });
    }
    plan.set(riderId, [...orderIds]);
  }

  assertValidPlan(plan);
  return plan;
}
