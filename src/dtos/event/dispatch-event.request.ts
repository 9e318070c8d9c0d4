/**
 * Request body for a runtime event
 * @example {
 *   "type": "rider_rejected",
 *   "riderId": 1,
 *   "orderId": 10
 * }
 */
export type DispatchEventRequest =
  | {
      /** A rider declines an order it currently holds */
      type: "rider_rejected";
      riderId: number;
      orderId: number;
    }
  | {
      /** An order is withdrawn entirely */
      type: "order_canceled";
      orderId: number;
    };
