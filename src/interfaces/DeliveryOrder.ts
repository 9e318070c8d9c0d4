export type OrderId = number;

/**
 * A delivery order as seen by the planner. Only the id matters for
 * assignment; routing and timing live elsewhere.
 */
export interface DeliveryOrder {
  id: OrderId;
}
