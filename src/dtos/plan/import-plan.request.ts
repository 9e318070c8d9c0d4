/**
 * Request body for registering an existing assignment as a plan
 * @example {
 *   "riders": [
 *     { "riderId": 1, "orderIds": [10, 40] },
 *     { "riderId": 2, "orderIds": [20] }
 *   ]
 * }
 */
export interface ImportPlanRequest {
  riders: {
    /** Rider id, unique across the plan */
    riderId: number;
    /** Orders held by the rider, in delivery order */
    orderIds: number[];
  }[];
}
