/**
 * Request body for building a new plan
 * Orders are dealt round robin over the riders, in the given order
 * @example {
 *   "riders": [1, 2, 3],
 *   "orders": [10, 20, 30, 40, 50]
 * }
 */
export interface CreatePlanRequest {
  /** Rider ids, unique, at least one for a plan to be built */
  riders: number[];

  /** Order ids, unique */
  orders: number[];
}
