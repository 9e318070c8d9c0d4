import { formatEvent, formatPlan, formatPlanSummary } from "./formatters";
import { DispatchEventType } from "../enums/DispatchEventType";

describe("formatters", () => {
  test("formatPlan lists riders by ascending id", () => {
    const plan = new Map([
      [3, [30]],
      [1, [10, 40]],
      [2, []],
    ]);

    expect(formatPlan(plan)).toBe("1:[10,40] 2:[] 3:[30]");
  });

  test("formatPlan on a plan without riders", () => {
    expect(formatPlan(new Map())).toBe("(no riders)");
  });

  test("formatEvent", () => {
    expect(
      formatEvent({ type: DispatchEventType.RIDER_REJECTED, riderId: 1, orderId: 10 })
    ).toBe("rider_rejected(rider=1, order=10)");
    expect(formatEvent({ type: DispatchEventType.ORDER_CANCELED, orderId: 50 })).toBe(
      "order_canceled(order=50)"
    );
  });

  test("formatPlanSummary", () => {
    expect(
      formatPlanSummary({
        riderCount: 3,
        orderCount: 5,
        minLoad: 1,
        maxLoad: 2,
        spread: 1,
        fair: true,
      })
    ).toBe("3 riders, 5 orders, load 1-2 (fair)");
    expect(
      formatPlanSummary({
        riderCount: 1,
        orderCount: 1,
        minLoad: 1,
        maxLoad: 1,
        spread: 0,
        fair: true,
      })
    ).toBe("1 rider, 1 order, load 1-1 (fair)");
    expect(
      formatPlanSummary({
        riderCount: 2,
        orderCount: 3,
        minLoad: 0,
        maxLoad: 3,
        spread: 3,
        fair: false,
      })
    ).toBe("2 riders, 3 orders, load 0-3 (spread 3)");
  });
});
