import {
  assertValidPlan,
  findInvariantViolations,
  findRiderForOrder,
  isFair,
  loadSpread,
  planOrderIds,
  sortedOrderIds,
  sortedRiderIds,
  summarizePlan,
} from "../planInvariants";
import { buildPlan } from "../planBuilder";
import { Plan } from "../../../interfaces/Plan";
import { InvalidPlanError } from "../../../errors/DispatchError";

const planOf = (entries: [number, number[]][]): Plan => new Map(entries);

describe("Plan invariants", () => {
  const plan = planOf([
    [3, [30, 10]],
    [1, [40]],
    [2, [20, 50]],
  ]);

  test("planOrderIds flattens in rider insertion order", () => {
    expect(planOrderIds(plan)).toEqual([30, 10, 40, 20, 50]);
  });

  test("sortedRiderIds and sortedOrderIds are ascending", () => {
    expect(sortedRiderIds(plan)).toEqual([1, 2, 3]);
    expect(sortedOrderIds(plan)).toEqual([10, 20, 30, 40, 50]);
  });

  test("sortedOrderIds drops duplicates", () => {
    const broken = planOf([
      [1, [5, 7]],
      [2, [5]],
    ]);

    expect(sortedOrderIds(broken)).toEqual([5, 7]);
  });

  test("findRiderForOrder finds the holder or returns undefined", () => {
    expect(findRiderForOrder(plan, 10)).toBe(3);
    expect(findRiderForOrder(plan, 99)).toBeUndefined();
  });

  describe("loadSpread / isFair", () => {
    test("measures min, max and spread", () => {
      expect(loadSpread(plan)).toEqual({ min: 1, max: 2, spread: 1 });
      expect(isFair(plan)).toBe(true);
    });

    test("flags a spread above one", () => {
      const lopsided = planOf([
        [1, []],
        [2, [20, 21]],
      ]);

      expect(loadSpread(lopsided)).toEqual({ min: 0, max: 2, spread: 2 });
      expect(isFair(lopsided)).toBe(false);
    });

    test("treats an empty plan as fair", () => {
      expect(loadSpread(new Map())).toEqual({ min: 0, max: 0, spread: 0 });
      expect(isFair(new Map())).toBe(true);
    });
  });

  describe("findInvariantViolations", () => {
    test("returns nothing for a valid plan", () => {
      expect(findInvariantViolations(plan)).toEqual([]);
    });

    test("reports orders held by several riders", () => {
      const broken = planOf([
        [2, [7]],
        [1, [7, 8]],
      ]);

      expect(findInvariantViolations(broken)).toEqual([
        {
          orderId: 7,
          riderIds: [1, 2],
          message: "Order 7 is held 2 times (riders 1, 2)",
        },
      ]);
    });

    test("reports orders repeated within one sequence", () => {
      const broken = planOf([[1, [9, 4, 9]]]);

      expect(findInvariantViolations(broken)).toEqual([
        {
          orderId: 9,
          riderIds: [1, 1],
          message: "Order 9 is held 2 times (riders 1, 1)",
        },
      ]);
    });
  });

  test("assertValidPlan throws InvalidPlanError with the violations", () => {
    const broken = planOf([
      [1, [7]],
      [2, [7]],
    ]);

    expect(() => assertValidPlan(plan)).not.toThrow();
    expect(() => assertValidPlan(broken)).toThrow(
      "Plan holds 1 duplicated order(s)"
    );
    expect(() => assertValidPlan(broken)).toThrow(InvalidPlanError);
  });

  test("summarizePlan", () => {
    expect(summarizePlan(plan)).toEqual({
      riderCount: 3,
      orderCount: 5,
      minLoad: 1,
      maxLoad: 2,
      spread: 1,
      fair: true,
    });
  });

  describe("large plans", () => {
    const LARGE = 300_000;
    const ids = Array.from({ length: LARGE }, (_, i) => ({ id: i }));

    test("one rider holding every order", () => {
      const single = buildPlan([{ id: 1 }], ids);

      const orderIds = planOrderIds(single);
      expect(orderIds.length).toBe(LARGE);
      expect(orderIds[LARGE - 1]).toBe(LARGE - 1);
      expect(summarizePlan(single)).toEqual({
        riderCount: 1,
        orderCount: LARGE,
        minLoad: LARGE,
        maxLoad: LARGE,
        spread: 0,
        fair: true,
      });
    });

    test("one order per rider across many riders", () => {
      const wide = buildPlan(ids, ids);

      expect(loadSpread(wide)).toEqual({ min: 1, max: 1, spread: 0 });
      expect(isFair(wide)).toBe(true);
      expect(summarizePlan(wide).orderCount).toBe(LARGE);
    });
  });
});
