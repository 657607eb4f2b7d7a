import { clamp, roundTo } from "@pricing/kit";
import type { CriticThresholds } from "../types/config.js";
import type {
  CriticDecision,
  CriticEvaluation,
  PromotionDesign,
  Recommendation,
} from "../types/state.js";

export const REVISION_STEP_PERCENT = 2;
export const REVISION_NOTE = " | revised by multi-critic arbitration to reduce risk.";
export const BYPASS_REASON = "Multi-critic disabled; bypassed.";

export interface CriticSettings {
  minMarginPercent: number;
  maxDiscountPercent: number;
  thresholds: CriticThresholds;
}

export interface CriticInputs {
  baseCost: number;
  /** 7-day average daily sales; missing or below 1 is treated as 1. */
  avgDailySales: number | undefined;
}

export interface ReviewOutcome {
  evaluations: CriticEvaluation[];
  decision: CriticDecision;
  /** Present only when the decision is "revise". */
  revisedProposal?: PromotionDesign;
}

function score(value: number): number {
  return roundTo(clamp(value, 0, 100), 3);
}

export function evaluateProfit(proposal: PromotionDesign, inputs: CriticInputs, settings: CriticSettings): CriticEvaluation {
  const margin = proposal.marginPercent;
  const floor = settings.minMarginPercent;
  const expectedProfit = (proposal.promotionalPrice - inputs.baseCost) * proposal.expectedUnitsSold;

  const riskFlags: string[] = [];
  let recommendation: Recommendation = "approve";
  if (margin < floor) {
    riskFlags.push("margin_below_floor");
    recommendation = "reject";
  } else if (margin < floor + 2) {
    riskFlags.push("margin_near_floor");
    recommendation = "revise";
  }

  return {
    evaluatorName: "profit",
    score: score(margin * 3 + expectedProfit * 0.05),
    rationale: `Margin=${margin.toFixed(2)}% vs floor=${floor.toFixed(2)}%. Expected profit=${expectedProfit.toFixed(2)}.`,
    riskFlags,
    recommendation,
  };
}

/**
 * Uplift under 1.1x baseline is a revise, whatever the discount. The growth critic never
 * rejects on its own: a zero-discount offer that misses baseline demand still goes to revision.
 */
export function evaluateGrowth(proposal: PromotionDesign, inputs: CriticInputs): CriticEvaluation {
  const discount = proposal.discountValue;
  const baseline = Math.max(inputs.avgDailySales ?? 1, 1);
  const uplift = proposal.expectedUnitsSold / baseline;

  const riskFlags: string[] = [];
  let recommendation: Recommendation = "approve";
  if (uplift < 1.1) {
    riskFlags.push("limited_growth_uplift");
    recommendation = "revise";
  }

  return {
    evaluatorName: "growth",
    score: score(uplift * 35 + discount * 1.2),
    rationale: `Expected unit uplift=${uplift.toFixed(2)}x baseline. Discount=${discount.toFixed(2)}%.`,
    riskFlags,
    recommendation,
  };
}

export function evaluateBrand(proposal: PromotionDesign, settings: CriticSettings): CriticEvaluation {
  const discount = proposal.discountValue;
  const maxDiscount = settings.maxDiscountPercent;
  const fatiguePenalty = proposal.promotionType === "flash_sale" ? 12 : 0;
  const value = score(100 - discount * 2 - fatiguePenalty);

  const riskFlags: string[] = [];
  if (discount >= maxDiscount) riskFlags.push("max_discount_boundary");
  if (discount > maxDiscount * 0.8) riskFlags.push("brand_dilution_risk");

  let recommendation: Recommendation = "approve";
  if (value < 40) recommendation = "reject";
  else if (value < 60) recommendation = "revise";

  return {
    evaluatorName: "brand",
    score: value,
    rationale: `Discount=${discount.toFixed(2)}% with promotion type ${proposal.promotionType}; penalized for discount depth and frequency.`,
    riskFlags,
    recommendation,
  };
}

/**
 * reject if any evaluator rejects or the mean is under the reject threshold;
 * otherwise revise if any evaluator revises or the mean is under the revise threshold.
 */
export function arbitrate(evaluations: readonly CriticEvaluation[], thresholds: CriticThresholds): CriticDecision {
  if (evaluations.length === 0) {
    return { enabled: true, action: "approve", averageScore: null, reason: "No evaluator outputs available." };
  }

  const mean = evaluations.reduce((sum, e) => sum + e.score, 0) / evaluations.length;
  const hasReject = evaluations.some((e) => e.recommendation === "reject");
  const hasRevise = evaluations.some((e) => e.recommendation === "revise");

  let action: Recommendation = "approve";
  if (hasReject || mean < thresholds.rejectThreshold) action = "reject";
  else if (hasRevise || mean < thresholds.reviseThreshold) action = "revise";

  return {
    enabled: true,
    action,
    averageScore: roundTo(mean, 3),
    reason: `Arbitration=${action}. avg_score=${mean.toFixed(2)}, has_revise=${hasRevise}, has_reject=${hasReject}`,
  };
}

/** Fixed-step revision: discount down by REVISION_STEP_PERCENT, price and margin recomputed. */
export function reviseProposal(proposal: PromotionDesign, baseCost: number, maxDiscountPercent: number): PromotionDesign {
  const discount = clamp(proposal.discountValue - REVISION_STEP_PERCENT, 0, maxDiscountPercent);
  const price = proposal.originalPrice > 0
    ? roundTo(proposal.originalPrice * (1 - discount / 100), 2)
    : proposal.promotionalPrice;
  const marginPercent = price > 0 ? roundTo(((price - baseCost) / price) * 100, 2) : proposal.marginPercent;

  return {
    ...proposal,
    discountValue: roundTo(discount, 2),
    promotionalPrice: price,
    marginPercent,
    expectedRevenue: roundTo(price * proposal.expectedUnitsSold, 2),
    reason: `${proposal.reason}${REVISION_NOTE}`.trim(),
  };
}

export function bypassedDecision(): CriticDecision {
  return { enabled: false, action: "approve", averageScore: null, reason: BYPASS_REASON };
}

/** Runs every evaluator, arbitrates, and applies the revision when asked. */
export function reviewProposal(
  proposal: PromotionDesign | undefined,
  inputs: CriticInputs,
  settings: CriticSettings,
): ReviewOutcome {
  if (!proposal) {
    return {
      evaluations: [],
      decision: { enabled: true, action: "reject", averageScore: 0, reason: "No promotion design available for review." },
    };
  }

  const evaluations = [
    evaluateProfit(proposal, inputs, settings),
    evaluateGrowth(proposal, inputs),
    evaluateBrand(proposal, settings),
  ];
  const decision = arbitrate(evaluations, settings.thresholds);
  if (decision.action !== "revise") {
    return { evaluations, decision };
  }
  return {
    evaluations,
    decision,
    revisedProposal: reviseProposal(proposal, inputs.baseCost, settings.maxDiscountPercent),
  };
}
