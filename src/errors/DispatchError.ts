import { DispatchErrorCode } from "../enums/DispatchErrorCode";
import { RiderId } from "../interfaces/Rider";
import { OrderId } from "../interfaces/DeliveryOrder";

/**
 * Base class for every error the dispatch service raises on purpose.
 * `statusCode` is the HTTP status the error handler answers with.
 */
export class DispatchError extends Error {
  readonly code: DispatchErrorCode;
  readonly statusCode: number;
  readonly details?: unknown;

  constructor(
    message: string,
    code: DispatchErrorCode,
    statusCode: number,
    details?: unknown
  ) {
    super(message);
    this.name = "DispatchError";
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}

/**
 * A plan cannot be built without riders
 */
export class EmptyRiderSetError extends DispatchError {
  constructor() {
    super(
      "Cannot build a plan without riders",
      DispatchErrorCode.EMPTY_RIDER_SET,
      422
    );
    this.name = "EmptyRiderSetError";
  }
}

/**
 * A rejected order has nowhere to go: the rejecting rider is the only one
 */
export class NoAlternateRiderError extends DispatchError {
  readonly riderId: RiderId;
  readonly orderId: OrderId;

  constructor(riderId: RiderId, orderId: OrderId) {
    super(
      `Rider ${riderId} rejected order ${orderId} but no other rider can take it`,
      DispatchErrorCode.NO_ALTERNATE_RIDER,
      409,
      { riderId, orderId }
    );
    this.name = "NoAlternateRiderError";
    this.riderId = riderId;
    this.orderId = orderId;
  }
}

export class PlanNotFoundError extends DispatchError {
  constructor(planId: string) {
    super(`Plan ${planId} not found`, DispatchErrorCode.PLAN_NOT_FOUND, 404, {
      planId,
    });
    this.name = "PlanNotFoundError";
  }
}

export class InvalidPlanError extends DispatchError {
  constructor(message: string, details?: unknown) {
    super(message, DispatchErrorCode.INVALID_PLAN, 422, details);
    this.name = "InvalidPlanError";
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

export class ValidationError extends DispatchError {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    super("Request validation failed", DispatchErrorCode.VALIDATION_FAILED, 400, issues);
    this.name = "ValidationError";
    this.issues = issues;
  }
}

/**
 * Raised by event replay; keeps the position of the event that failed
 * and answers with the status of the underlying error.
 */
export class EventReplayError extends DispatchError {
  readonly eventIndex: number;
  readonly reason: DispatchError;

  constructor(eventIndex: number, reason: DispatchError) {
    super(
      `Event #${eventIndex} failed: ${reason.message}`,
      DispatchErrorCode.EVENT_REPLAY_FAILED,
      reason.statusCode,
      { eventIndex, code: reason.code }
    );
    this.name = "EventReplayError";
    this.eventIndex = eventIndex;
    this.reason = reason;
  }
}
