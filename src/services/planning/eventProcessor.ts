/**
 * EVENT PROCESSOR
 *
 * Applies one runtime event to a plan and returns the next plan.
 *
 * - RIDER_REJECTED: the order moves from the rejecting rider to the
 *   least-loaded other rider (ties: smallest rider id). Events that do not
 *   match the plan are ignored.
 * - ORDER_CANCELED: the order is dropped from whichever rider holds it.
 *   Ignored when no rider holds it.
 *
 * A no-op returns the very same plan object, so callers can tell an
 * ignored event by reference. Riders are never added or removed.
 */

import { Plan } from "../../interfaces/Plan";
import { RiderId } from "../../interfaces/Rider";
import { OrderId } from "../../interfaces/DeliveryOrder";
import { DispatchEvent } from "../../interfaces/DispatchEvent";
import { DispatchEventType } from "../../enums/DispatchEventType";
import {
  DispatchError,
  EventReplayError,
  NoAlternateRiderError,
} from "../../errors/DispatchError";

export function applyEvent(plan: Plan, event: DispatchEvent): Plan {
  switch (event.type) {
    case DispatchEventType.RIDER_REJECTED:
      return applyRiderRejected(plan, event.riderId, event.orderId);
    case DispatchEventType.ORDER_CANCELED:
      return applyOrderCanceled(plan, event.orderId);
  }
}

/**
 * Fold a sequence of events over a plan, one at a time in order.
 * The first failing event aborts the replay.
 */
export function applyEvents(
  plan: Plan,
  events: readonly DispatchEvent[]
): Plan {
  let current = plan;
  events.forEach((event, index) => {
    try {
      current = applyEvent(current, event);
    } catch (error) {
      if (error instanceof DispatchError) {
        throw new EventReplayError(index, error);
      }
      throw error;
    }
  });
  return current;
}

/**
 * Least-loaded rider other than `excludedRiderId`, ties broken by
 * ascending rider id. Undefined when no other rider exists.
 */
export function selectTargetRider(
  plan: Plan,
  excludedRiderId: RiderId
): RiderId | undefined {
  const candidates = [...plan.entries()]
    .filter(([riderId]) => riderId !== excludedRiderId)
    .map(([riderId, orderIds]) => ({ riderId, load: orderIds.length }))
    .sort((a, b) => a.load - b.load || a.riderId - b.riderId);

  return candidates.length > 0 ? candidates[0].riderId : undefined;
}

function applyRiderRejected(
  plan: Plan,
  riderId: RiderId,
  orderId: OrderId
): Plan {
  const held = plan.get(riderId);
  const position = held ? held.indexOf(orderId) : -1;
  if (!held || position === -1) {
    return plan;
  }

  const targetRiderId = selectTargetRider(plan, riderId);
  if (targetRiderId === undefined) {
    throw new NoAlternateRiderError(riderId, orderId);
  }

  const remaining = [...held];
  remaining.splice(position, 1);

  const next = new Map(plan);
  next.set(riderId, remaining);
  next.set(targetRiderId, [...(plan.get(targetRiderId) ?? []), orderId]);
  return next;
}

function applyOrderCanceled(plan: Plan, orderId: OrderId): Plan {
  let changed = false;
  const next = new Map<RiderId, readonly OrderId[]>();

  for (const [riderId, orderIds] of plan) {
    if (orderIds.includes(orderId)) {
      next.set(
        riderId,
        orderIds.filter((id) => id !== orderId)
      );
      changed = true;
    } else {
      next.set(riderId, orderIds);
    }
  }

  return changed ? next : plan;
}
