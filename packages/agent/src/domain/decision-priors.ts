import { z } from "zod";
import { finiteOr, roundTo } from "@pricing/kit";
import type { LearnedPriors, RoiBand } from "../types/state.js";

export const PRIOR_MAX_AGE_HOURS = 24 * 14;
export const HISTORY_CASE_LIMIT = 25;
export const FEEDBACK_WINDOW_DAYS = 180;
export const FEEDBACK_LIMIT = 100;

export const HistoricalCaseSchema = z.object({
  avg_performance_ratio: z.unknown().optional(),
  discount_value: z.unknown().optional(),
  margin_percent: z.unknown().optional(),
}).passthrough();

export const ApprovalFeedbackSchema = z.object({
  reviewer_outcome: z.string().nullish(),
}).passthrough();

export type HistoricalCase = z.infer<typeof HistoricalCaseSchema>;
export type ApprovalFeedback = z.infer<typeof ApprovalFeedbackSchema>;

export interface PriorSettings {
  minMarginPercent: number;
  maxDiscountPercent: number;
}

function average(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((a, b) => a + b, 0) / values.length;
}

export function toRoiBand(performanceRatio: number): RoiBand {
  if (performanceRatio >= 1.2) return "high";
  if (performanceRatio >= 0.9) return "medium";
  return "low";
}

/**
 * Summarize past promotion outcomes (and reviewer feedback) into a prior.
 * Returns null when there is neither history nor feedback.
 */
export function derivePriors(
  cases: readonly HistoricalCase[],
  feedback: readonly ApprovalFeedback[],
  settings: PriorSettings,
  now: Date,
): LearnedPriors | null {
  if (cases.length === 0 && feedback.length === 0) return null;

  const ratios = cases.map((c) => finiteOr(c.avg_performance_ratio, 0));
  const discounts = cases.map((c) => finiteOr(c.discount_value, 0));
  const margins = cases.map((c) => finiteOr(c.margin_percent, 0));

  const successfulCases = ratios.filter((r) => r >= 1.0).length;
  const successProbability = cases.length > 0 ? successfulCases / cases.length : 0.5;

  const approved = feedback.filter((f) => f.reviewer_outcome === "approved").length;
  const rejected = feedback.filter((f) => f.reviewer_outcome === "rejected").length;
  const feedbackSignals = approved + rejected;
  const approvalRate = feedbackSignals > 0 ? approved / feedbackSignals : null;

  const averageDiscount = average(discounts);
  const averageMargin = average(margins);
  const averageRatio = average(ratios);

  const riskFlags: string[] = [];
  if (successProbability < 0.4) riskFlags.push("historically_low_success");
  if (approvalRate !== null && approvalRate < 0.5) riskFlags.push("low_human_approval_rate");
  // zero averages mean "no data", not "zero margin"
  if (averageMargin > 0 && averageMargin < settings.minMarginPercent + 2) riskFlags.push("margin_pressure");
  if (averageDiscount > 0 && averageDiscount > settings.maxDiscountPercent * 0.8) riskFlags.push("discount_intensity_high");

  const confidence = Math.min(0.95, 0.2 + cases.length * 0.03 + feedbackSignals * 0.02);

  return {
    successProbability: roundTo(successProbability, 4),
    confidence: roundTo(confidence, 4),
    expectedRoiBand: toRoiBand(averageRatio),
    riskFlags,
    recommendedDiscountRange: {
      minPercent: roundTo(Math.max(0, averageDiscount - 5), 2),
      maxPercent: roundTo(Math.min(settings.maxDiscountPercent, averageDiscount + 5), 2),
    },
    evidence: {
      historicalCases: cases.length,
      successfulCases,
      feedbackSignals,
      approvalRate: approvalRate === null ? null : roundTo(approvalRate, 4),
      averageMarginPercent: roundTo(averageMargin, 4),
      averageDiscountPercent: roundTo(averageDiscount, 4),
      averagePerformanceRatio: roundTo(averageRatio, 4),
    },
    generatedAt: now.toISOString(),
  };
}
