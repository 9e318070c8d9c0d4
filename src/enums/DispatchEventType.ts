export enum DispatchEventType {
  RIDER_REJECTED = 'rider_rejected', // Rider declined an order it holds
  ORDER_CANCELED = 'order_canceled', // Order withdrawn entirely
}
