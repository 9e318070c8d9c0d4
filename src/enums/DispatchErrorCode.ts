export enum DispatchErrorCode {
  EMPTY_RIDER_SET = 'EMPTY_RIDER_SET',
  NO_ALTERNATE_RIDER = 'NO_ALTERNATE_RIDER',
  PLAN_NOT_FOUND = 'PLAN_NOT_FOUND',
  INVALID_PLAN = 'INVALID_PLAN',
  VALIDATION_FAILED = 'VALIDATION_FAILED',
  EVENT_REPLAY_FAILED = 'EVENT_REPLAY_FAILED',
}
