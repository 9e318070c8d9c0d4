import { DispatchEventType } from "../enums/DispatchEventType";
import { RiderId } from "./Rider";
import { OrderId } from "./DeliveryOrder";

export interface RiderRejectedEvent {
  type: DispatchEventType.RIDER_REJECTED;
  riderId: RiderId;
  orderId: OrderId;
}

export interface OrderCanceledEvent {
  type: DispatchEventType.ORDER_CANCELED;
  orderId: OrderId;
}

export type DispatchEvent = RiderRejectedEvent | OrderCanceledEvent;
