/**
 * Maps an abstract event description (indices) onto a concrete event
 * against the current plan, using the sorted rider and order enumerations.
 * Indices wrap around, so any non-negative integer resolves.
 *
 * Used to drive randomized event sequences; nothing here is stored.
 */

import { Plan } from "../../interfaces/Plan";
import { DispatchEvent } from "../../interfaces/DispatchEvent";
import { DispatchEventType } from "../../enums/DispatchEventType";
import { sortedOrderIds, sortedRiderIds } from "./planInvariants";

export interface RiderRejectedDescriptor {
  type: DispatchEventType.RIDER_REJECTED;
  whichRider: number;
  whichOrder: number;
}

export interface OrderCanceledDescriptor {
  type: DispatchEventType.ORDER_CANCELED;
  whichOrder: number;
}

export type EventDescriptor = RiderRejectedDescriptor | OrderCanceledDescriptor;

function wrapIndex(index: number, length: number): number {
  return ((index % length) + length) % length;
}

/**
 * @returns the concrete event, or undefined when the plan has nothing the
 * descriptor could point at (no riders, an empty rider, no orders)
 */
export function resolveEvent(
  plan: Plan,
  descriptor: EventDescriptor
): DispatchEvent | undefined {
  switch (descriptor.type) {
    case DispatchEventType.RIDER_REJECTED: {
      const riderIds = sortedRiderIds(plan);
      if (riderIds.length === 0) {
        return undefined;
      }

      const riderId = riderIds[wrapIndex(descriptor.whichRider, riderIds.length)];
      const held = plan.get(riderId) ?? [];
      if (held.length === 0) {
        return undefined;
      }

      return {
        type: DispatchEventType.RIDER_REJECTED,
        riderId,
        orderId: held[wrapIndex(descriptor.whichOrder, held.length)],
      };
    }
    case DispatchEventType.ORDER_CANCELED: {
      const orderIds = sortedOrderIds(plan);
      if (orderIds.length === 0) {
        return undefined;
      }

      return {
        type: DispatchEventType.ORDER_CANCELED,
        orderId: orderIds[wrapIndex(descriptor.whichOrder, orderIds.length)],
      };
    }
  }
}
