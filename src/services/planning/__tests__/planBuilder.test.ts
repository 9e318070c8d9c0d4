/**
 * Unit Tests for the round-robin Plan Builder
 */

import { buildPlan } from "../planBuilder";
import { EmptyRiderSetError } from "../../../errors/DispatchError";
import { DispatchErrorCode } from "../../../enums/DispatchErrorCode";
import { Rider } from "../../../interfaces/Rider";
import { DeliveryOrder } from "../../../interfaces/DeliveryOrder";

const riders = (...ids: number[]): Rider[] => ids.map((id) => ({ id }));
const orders = (...ids: number[]): DeliveryOrder[] => ids.map((id) => ({ id }));

describe("buildPlan", () => {
  test("deals orders round robin in input order", () => {
    const plan = buildPlan(riders(1, 2, 3), orders(10, 20, 30, 40, 50));

    expect([...plan.entries()]).toEqual([
      [1, [10, 40]],
      [2, [20, 50]],
      [3, [30]],
    ]);
  });

  test("follows rider input order, not rider id order", () => {
    const plan = buildPlan(riders(7, 3, 5), orders(1, 2, 3, 4));

    expect(plan.get(7)).toEqual([1, 4]);
    expect(plan.get(3)).toEqual([2]);
    expect(plan.get(5)).toEqual([3]);
    expect([...plan.keys()]).toEqual([7, 3, 5]);
  });

  test("gives every rider one order when counts match", () => {
    const plan = buildPlan(riders(1, 2), orders(100, 200));

    expect(plan.get(1)).toEqual([100]);
    expect(plan.get(2)).toEqual([200]);
  });

  test("keeps riders without orders as empty sequences", () => {
    const plan = buildPlan(riders(1, 2, 3, 4), orders(10, 20));

    expect(plan.size).toBe(4);
    expect(plan.get(3)).toEqual([]);
    expect(plan.get(4)).toEqual([]);
  });

  test("builds an empty assignment when there are no orders", () => {
    const plan = buildPlan(riders(1, 2), []);

    expect([...plan.entries()]).toEqual([
      [1, []],
      [2, []],
    ]);
  });

  test("single rider receives everything in order", () => {
    const plan = buildPlan(riders(9), orders(3, 1, 2));

    expect(plan.get(9)).toEqual([3, 1, 2]);
  });

  test("throws EmptyRiderSetError when there are no riders", () => {
    expect(() => buildPlan([], orders(10, 20))).toThrow(EmptyRiderSetError);
  });

  test("EmptyRiderSetError carries its code and status", () => {
    try {
      buildPlan([], []);
      throw new Error("expected buildPlan to throw");
    } catch (error) {
      expect(error).toBeInstanceOf(EmptyRiderSetError);
      if (error instanceof EmptyRiderSetError) {
        expect(error.code).toBe(DispatchErrorCode.EMPTY_RIDER_SET);
        expect(error.statusCode).toBe(422);
      }
    }
  });

  test("does not mutate its inputs", () => {
    const riderInput = riders(1, 2);
    const orderInput = orders(10, 20, 30);

    buildPlan(riderInput, orderInput);

    expect(riderInput).toEqual([{ id: 1 }, { id: 2 }]);
    expect(orderInput).toEqual([{ id: 10 }, { id: 20 }, { id: 30 }]);
  });
});
