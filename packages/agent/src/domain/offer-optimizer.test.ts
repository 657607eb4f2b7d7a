import { describe, it, expect } from "vitest";
import {
  clampIterationBudget,
  evaluateOffer,
  optimizeOffer,
  INFEASIBLE_PENALTY,
  type OptimizerSettings,
} from "./offer-optimizer.js";
import type { PromotionDesign } from "../types/state.js";

function proposal(overrides: Partial<PromotionDesign> = {}): PromotionDesign {
  return {
    promotionType: "discount",
    discountType: "percentage",
    discountValue: 10,
    originalPrice: 10,
    promotionalPrice: 9,
    marginPercent: 44.44,
    validFrom: "2026-03-02T10:00:00.000Z",
    validUntil: "2026-03-03T10:00:00.000Z",
    targetRadiusKm: 5,
    expectedUnitsSold: 16,
    expectedRevenue: 144,
    reason: "DISCOUNT: undercut competitors",
    ...overrides,
  };
}

const settings: OptimizerSettings = {
  objective: "profit_maximization",
  maxIterations: 5,
  minMarginPercent: 10,
  maxDiscountPercent: 40,
};

describe("clampIterationBudget", () => {
  it("clamps to [1, 10]", () => {
    expect(clampIterationBudget(0)).toBe(1);
    expect(clampIterationBudget(-3)).toBe(1);
    expect(clampIterationBudget(4)).toBe(4);
    expect(clampIterationBudget(25)).toBe(10);
  });
});

describe("evaluateOffer", () => {
  it("applies the demand multiplier and profit objective", () => {
    const result = evaluateOffer(proposal(), 5, settings);
    // 16 * (1 + 0.10 * 1.25) = 18 units; (9 - 5) * 18 = 72
    expect(result.expectedUnitsSold).toBe(18);
    expect(result.expectedRevenue).toBe(162);
    expect(result.objectiveScore).toBe(72);
    expect(result.marginPercent).toBe(44.44);
    expect(result.feasible).toBe(true);
  });

  it("penalizes an offer below the margin floor", () => {
    const result = evaluateOffer(proposal({ promotionalPrice: 5.2 }), 5, settings);
    expect(result.constraints).toEqual({ marginOk: false, discountOk: true, nonNegativeDiscount: true });
    // (5.2 - 5) * 18 = 3.6
    expect(result.objectiveScore).toBe(3.6 - INFEASIBLE_PENALTY);
  });

  it("flags a discount above the maximum", () => {
    const result = evaluateOffer(proposal({ discountValue: 45 }), 5, settings);
    expect(result.constraints.discountOk).toBe(false);
    expect(result.feasible).toBe(false);
  });

  it("scores inventory_reduction as units * 5 + profit * 0.1", () => {
    const result = evaluateOffer(proposal(), 5, { ...settings, objective: "inventory_reduction" });
    expect(result.objectiveScore).toBe(97.2);
  });

  it("scores sell_through_acceleration as units * (1 + d/100)", () => {
    const result = evaluateOffer(proposal(), 5, { ...settings, objective: "sell_through_acceleration" });
    expect(result.objectiveScore).toBe(19.8);
  });
});

describe("optimizeOffer", () => {
  it("keeps the best feasible candidate and marks exactly one iteration selected", () => {
    const outcome = optimizeOffer(proposal(), 5, settings);

    // discounts tried: 10, 12, 8, 14, 6 -> profits 72, 68.4, 75.6, 68.4, 74.8
    expect(outcome.iterations.map((i) => i.candidateOffer.discountValue)).toEqual([10, 12, 8, 14, 6]);
    expect(outcome.iterations.map((i) => i.objectiveScore)).toEqual([72, 68.4, 75.6, 68.4, 74.8]);
    expect(outcome.iterations.filter((i) => i.isSelected).map((i) => i.index)).toEqual([2]);

    expect(outcome.bestOffer.discountValue).toBe(8);
    expect(outcome.bestOffer.promotionalPrice).toBe(9.2);
    expect(outcome.bestOffer.expectedUnitsSold).toBe(18);
    expect(outcome.bestOffer.reason).toBe(
      "DISCOUNT: undercut competitors | optimized in 5 iterations (selected iteration 2, objective score 75.60)",
    );
    expect(outcome.result).toEqual({
      enabled: true,
      iterations: 5,
      selectedIteration: 2,
      selectedObjectiveScore: 75.6,
      objective: "profit_maximization",
    });
  });

  it("follows the configured objective", () => {
    const outcome = optimizeOffer(proposal(), 5, { ...settings, objective: "inventory_reduction" });
    // units 18,18,18,19,17 -> the 14% candidate wins with 95 + 6.84
    expect(outcome.result.selectedIteration).toBe(3);
    expect(outcome.result.selectedObjectiveScore).toBe(101.84);
    expect(outcome.bestOffer.discountValue).toBe(14);
  });

  it("picks the least-negative candidate when every candidate breaks the margin floor", () => {
    const underwater = proposal({ discountValue: 20, promotionalPrice: 8, expectedUnitsSold: 8 });
    const outcome = optimizeOffer(underwater, 9, { ...settings, maxIterations: 3 });

    // discounts 20, 22, 18 -> profits -10, -12, -8 before the penalty
    expect(outcome.iterations).toHaveLength(3);
    expect(outcome.iterations.every((i) => !i.constraintsSatisfied.marginOk)).toBe(true);
    expect(outcome.result.iterations).toBe(3);
    expect(outcome.result.selectedIteration).toBe(2);
    expect(outcome.result.selectedObjectiveScore).toBe(-8 - INFEASIBLE_PENALTY);
    expect(outcome.bestOffer.discountValue).toBe(18);
    expect(outcome.bestOffer.promotionalPrice).toBe(8.2);
  });

  it("clamps candidate discounts into [0, max]", () => {
    const outcome = optimizeOffer(proposal({ discountValue: 39 }), 5, { ...settings, maxIterations: 2 });
    expect(outcome.iterations.map((i) => i.candidateOffer.discountValue)).toEqual([39, 40]);

    const low = optimizeOffer(proposal({ discountValue: 1 }), 5, { ...settings, maxIterations: 3 });
    expect(low.iterations.map((i) => i.candidateOffer.discountValue)).toEqual([1, 3, 0]);
  });

  it("clamps the iteration budget", () => {
    expect(optimizeOffer(proposal(), 5, { ...settings, maxIterations: 50 }).iterations).toHaveLength(10);
    expect(optimizeOffer(proposal(), 5, { ...settings, maxIterations: 0 }).iterations).toHaveLength(1);
  });

  it("keeps the baseline when no candidate is strictly better", () => {
    const outcome = optimizeOffer(proposal(), 5, { ...settings, maxIterations: 1 });
    expect(outcome.result.selectedIteration).toBe(0);
    expect(outcome.bestOffer.discountValue).toBe(10);
    expect(outcome.bestOffer.expectedUnitsSold).toBe(16);
  });

  it("is deterministic", () => {
    const a = optimizeOffer(proposal(), 5, settings);
    const b = optimizeOffer(proposal(), 5, settings);
    expect(b.result.selectedIteration).toBe(a.result.selectedIteration);
    expect(b.result.selectedObjectiveScore).toBe(a.result.selectedObjectiveScore);
  });

  it("does not mutate the proposal", () => {
    const input = proposal();
    optimizeOffer(input, 5, settings);
    expect(input).toEqual(proposal());
  });
});
