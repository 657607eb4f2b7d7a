import { describe, it, expect } from "vitest";
import { assessPromotion, elapsedFraction, rateRatio } from "./promotion-performance.js";
import type { ActivePromotion } from "../types/state.js";

const thresholds = { excellent: 1.5, good: 1.0, acceptable: 0.7, minObservedFraction: 0.25 };
const settings = { thresholds, autoRetractThreshold: 0.5, minMarginPercent: 10 };

function promotion(overrides: Partial<ActivePromotion> = {}): ActivePromotion {
  return {
    id: 7,
    sku_id: 3,
    store_id: 1,
    promotion_code: "PROMO-7",
    margin_percent: 30,
    valid_from: "2026-03-02T00:00:00.000Z",
    valid_until: "2026-03-03T00:00:00.000Z",
    expected_units_sold: 40,
    expected_revenue: 200,
    actual_units_sold: 10,
    actual_revenue: 50,
    ...overrides,
  };
}

describe("elapsedFraction", () => {
  it("measures the elapsed share of the window", () => {
    expect(elapsedFraction("2026-03-02T00:00:00Z", "2026-03-03T00:00:00Z", new Date("2026-03-02T06:00:00Z"))).toBe(0.25);
  });

  it("clamps before and after the window", () => {
    expect(elapsedFraction("2026-03-02T00:00:00Z", "2026-03-03T00:00:00Z", new Date("2026-03-01T00:00:00Z"))).toBe(0);
    expect(elapsedFraction("2026-03-02T00:00:00Z", "2026-03-03T00:00:00Z", new Date("2026-03-04T00:00:00Z"))).toBe(1);
  });

  it("treats an unknown window as fully elapsed", () => {
    expect(elapsedFraction(undefined, "2026-03-03T00:00:00Z", new Date())).toBe(1);
    expect(elapsedFraction("garbage", "2026-03-03T00:00:00Z", new Date())).toBe(1);
  });
});

describe("rateRatio", () => {
  it("buckets by threshold", () => {
    expect(rateRatio(1.6, thresholds)).toBe("excellent");
    expect(rateRatio(1.0, thresholds)).toBe("good");
    expect(rateRatio(0.7, thresholds)).toBe("acceptable");
    expect(rateRatio(0.69, thresholds)).toBe("poor");
  });
});

describe("assessPromotion", () => {
  it("rates a lagging promotion without retracting at the threshold", () => {
    // half the window elapsed: 20 units expected so far, 10 sold
    const result = assessPromotion(promotion(), new Date("2026-03-02T12:00:00.000Z"), settings);
    expect(result).toEqual({
      elapsedFraction: 0.5,
      expectedUnitsToDate: 20,
      unitsSoldSoFar: 10,
      revenueSoFar: 50,
      performanceRatio: 0.5,
      rating: "poor",
      marginMaintained: true,
      isProfitable: true,
      retractReason: null,
    });
  });

  it("advises retraction for a clear underperformer", () => {
    const result = assessPromotion(promotion({ actual_units_sold: 4 }), new Date("2026-03-02T12:00:00.000Z"), settings);
    expect(result.performanceRatio).toBe(0.2);
    expect(result.retractReason).toBe("Performance ratio 0.20 below retract threshold 0.5");
  });

  it("holds off before the minimum observation window", () => {
    const result = assessPromotion(promotion({ actual_units_sold: 0 }), new Date("2026-03-02T03:00:00.000Z"), settings);
    expect(result.rating).toBe("too_early");
    expect(result.retractReason).toBeNull();
  });

  it("retracts when the margin dropped under the floor", () => {
    const result = assessPromotion(promotion({ margin_percent: 6 }), new Date("2026-03-02T12:00:00.000Z"), settings);
    expect(result.marginMaintained).toBe(false);
    expect(result.retractReason).toBe("Margin 6% below floor 10%");
  });

  it("rates strong sales as excellent", () => {
    const result = assessPromotion(promotion({ actual_units_sold: 35 }), new Date("2026-03-02T12:00:00.000Z"), settings);
    expect(result.performanceRatio).toBe(1.75);
    expect(result.rating).toBe("excellent");
  });

  it("does not judge a promotion without an expectation", () => {
    const result = assessPromotion(promotion({ expected_units_sold: undefined }), new Date("2026-03-02T12:00:00.000Z"), settings);
    expect(result.performanceRatio).toBe(0);
    expect(result.rating).toBe("too_early");
    expect(result.retractReason).toBeNull();
  });
});
