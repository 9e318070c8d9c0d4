import { PlanSummary, RiderAssignment } from "../../interfaces/Plan";

/**
 * Plan state response
 * @example {
 *   "id": "550e8400-e29b-41d4-a716-446655440000",
 *   "version": 1,
 *   "createdAt": "2024-11-17T09:00:00.000Z",
 *   "updatedAt": "2024-11-17T09:05:00.000Z",
 *   "riders": [
 *     { "riderId": 1, "orderIds": [40] },
 *     { "riderId": 2, "orderIds": [20, 50] },
 *     { "riderId": 3, "orderIds": [30, 10] }
 *   ],
 *   "summary": {
 *     "riderCount": 3,
 *     "orderCount": 5,
 *     "minLoad": 1,
 *     "maxLoad": 2,
 *     "spread": 1,
 *     "fair": true
 *   }
 * }
 */
export interface PlanResponse {
  /** Plan identifier (UUID) */
  id: string;

  /** Number of events that changed the plan */
  version: number;

  createdAt: Date;

  updatedAt: Date;

  /** Assignments, riders by ascending id */
  riders: RiderAssignment[];

  summary: PlanSummary;
}
