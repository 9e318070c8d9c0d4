/**
 * PLAN BUILDER
 *
 * Builds the initial rider -> orders plan with a strict round robin:
 * the i-th order goes to the rider at position (i mod |riders|).
 *
 * Every rider ends up with floor(|orders| / |riders|) orders or one more,
 * so the plan is fair by construction. With fewer orders than riders the
 * trailing riders keep an empty sequence; that is valid output.
 *
 * Rider and order ids are assumed unique within their input. Duplicated
 * rider ids collapse into one key.
 */

import { Rider, RiderId } from "../../interfaces/Rider";
import { DeliveryOrder, OrderId } from "../../interfaces/DeliveryOrder";
import { Plan } from "../../interfaces/Plan";
import { EmptyRiderSetError } from "../../errors/DispatchError";

export function buildPlan(
  riders: readonly Rider[],
  orders: readonly DeliveryOrder[]
): Plan {
  // Must be checked before the loop: with zero riders there is no slot to fill
  if (riders.length === 0) {
    throw new EmptyRiderSetError();
  }

  const plan = new Map<RiderId, OrderId[]>();
  for (const rider of riders) {
    plan.set(rider.id, []);
  }

  orders.forEach((order, index) => {
    const rider = riders[index % riders.length];
    plan.get(rider.id)?.push(order.id);
  });

  return plan;
}
