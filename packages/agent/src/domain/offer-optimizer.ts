import { clamp, roundTo } from "@pricing/kit";
import type { OptimizationObjective } from "../types/config.js";
import type {
  ConstraintChecks,
  OptimizationIteration,
  OptimizationResult,
  PromotionDesign,
} from "../types/state.js";

/** Discount adjustments tried in order; the iteration budget truncates this list. */
export const DISCOUNT_DELTAS = [0, 2, -2, 4, -4, 6, -6, 8, -8, 10] as const;
export const MAX_ITERATIONS = DISCOUNT_DELTAS.length;
export const INFEASIBLE_PENALTY = 1_000_000;
/** Expected-units uplift per discount point: units * (1 + 1.25 * d/100). */
export const DEMAND_ELASTICITY = 1.25;

export interface OptimizerSettings {
  objective: OptimizationObjective;
  maxIterations: number;
  minMarginPercent: number;
  maxDiscountPercent: number;
}

export interface OfferEvaluation {
  objectiveName: OptimizationObjective;
  objectiveScore: number;
  constraints: ConstraintChecks;
  feasible: boolean;
  marginPercent: number;
  expectedUnitsSold: number;
  expectedRevenue: number;
  expectedProfit: number;
}

export interface OptimizationOutcome {
  bestOffer: PromotionDesign;
  iterations: OptimizationIteration[];
  result: OptimizationResult;
}

export function clampIterationBudget(requested: number): number {
  return clamp(Math.floor(requested), 1, MAX_ITERATIONS);
}

function objectiveScore(
  objective: OptimizationObjective,
  units: number,
  profit: number,
  revenue: number,
  discount: number,
): number {
  switch (objective) {
    case "inventory_reduction":
      return units * 5 + profit * 0.1;
    case "revenue_lift":
      return revenue;
    case "sell_through_acceleration":
      return units * (1 + discount / 100);
    case "profit_maximization":
      return profit;
  }
}

/**
 * Score one offer. Expected units are re-derived from the offer's own baseline with the
 * demand multiplier; any violated constraint subtracts INFEASIBLE_PENALTY.
 */
export function evaluateOffer(offer: PromotionDesign, baseCost: number, settings: OptimizerSettings): OfferEvaluation {
  const price = offer.promotionalPrice > 0 ? offer.promotionalPrice : 0.01;
  const discount = offer.discountValue;
  const marginPercent = ((price - baseCost) / price) * 100;

  const baselineUnits = offer.expectedUnitsSold > 0 ? offer.expectedUnitsSold : 1;
  const expectedUnitsSold = Math.max(1, Math.round(baselineUnits * (1 + (discount / 100) * DEMAND_ELASTICITY)));
  const expectedProfit = (price - baseCost) * expectedUnitsSold;
  const expectedRevenue = price * expectedUnitsSold;

  const constraints: ConstraintChecks = {
    marginOk: marginPercent >= settings.minMarginPercent,
    discountOk: discount <= settings.maxDiscountPercent,
    nonNegativeDiscount: discount >= 0,
  };
  const feasible = constraints.marginOk && constraints.discountOk && constraints.nonNegativeDiscount;

  let score = objectiveScore(settings.objective, expectedUnitsSold, expectedProfit, expectedRevenue, discount);
  if (!feasible) score -= INFEASIBLE_PENALTY;

  return {
    objectiveName: settings.objective,
    objectiveScore: roundTo(score, 4),
    constraints,
    feasible,
    marginPercent: roundTo(marginPercent, 2),
    expectedUnitsSold,
    expectedRevenue: roundTo(expectedRevenue, 2),
    expectedProfit: roundTo(expectedProfit, 2),
  };
}

/**
 * Bounded local search over discount deltas. The unmodified proposal is the baseline
 * (iteration 0); a candidate replaces the best only with a strictly higher score, so
 * ties keep the earlier offer. Deterministic for a given input.
 */
export function optimizeOffer(
  proposal: PromotionDesign,
  baseCost: number,
  settings: OptimizerSettings,
): OptimizationOutcome {
  const budget = clampIterationBudget(settings.maxIterations);
  const originalPrice = proposal.originalPrice > 0 ? proposal.originalPrice : 0.01;
  const baseDiscount = proposal.discountValue;

  let bestOffer: PromotionDesign = { ...proposal };
  let bestEval = evaluateOffer(proposal, baseCost, settings);
  let bestIndex = 0;

  const candidates: Array<Omit<OptimizationIteration, "isSelected">> = [];

  for (let index = 0; index < budget; index++) {
    const discount = clamp(baseDiscount + DISCOUNT_DELTAS[index], 0, settings.maxDiscountPercent);
    const priced: PromotionDesign = {
      ...proposal,
      discountValue: roundTo(discount, 2),
      promotionalPrice: roundTo(originalPrice * (1 - discount / 100), 2),
    };
    const evaluation = evaluateOffer(priced, baseCost, settings);
    const candidate: PromotionDesign = {
      ...priced,
      marginPercent: evaluation.marginPercent,
      expectedUnitsSold: evaluation.expectedUnitsSold,
      expectedRevenue: evaluation.expectedRevenue,
    };

    candidates.push({
      index,
      objectiveName: evaluation.objectiveName,
      objectiveScore: evaluation.objectiveScore,
      candidateOffer: candidate,
      constraintsSatisfied: evaluation.constraints,
    });

    if (evaluation.objectiveScore > bestEval.objectiveScore) {
      bestEval = evaluation;
      bestOffer = candidate;
      bestIndex = index;
    }
  }

  const iterations: OptimizationIteration[] = candidates.map((c) => ({ ...c, isSelected: c.index === bestIndex }));

  bestOffer = {
    ...bestOffer,
    reason: `${bestOffer.reason} | optimized in ${budget} iterations (selected iteration ${bestIndex}, objective score ${bestEval.objectiveScore.toFixed(2)})`.trim(),
  };

  return {
    bestOffer,
    iterations,
    result: {
      enabled: true,
      iterations: budget,
      selectedIteration: bestIndex,
      selectedObjectiveScore: bestEval.objectiveScore,
      objective: settings.objective,
    },
  };
}
