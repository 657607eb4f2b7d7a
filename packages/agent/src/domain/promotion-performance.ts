import { clamp, roundTo } from "@pricing/kit";
import type { PerformanceThresholds } from "../types/config.js";
import type { ActivePromotion, PerformanceData, PerformanceRating } from "../types/state.js";

export interface PerformanceSettings {
  thresholds: PerformanceThresholds;
  autoRetractThreshold: number;
  minMarginPercent: number;
}

function parseTime(value: string | undefined): number | null {
  if (!value) return null;
  const t = Date.parse(value);
  return Number.isNaN(t) ? null : t;
}

/** Share of the validity window already elapsed; 1 when the window is unknown. */
export function elapsedFraction(validFrom: string | undefined, validUntil: string | undefined, now: Date): number {
  const from = parseTime(validFrom);
  const until = parseTime(validUntil);
  if (from === null || until === null || until <= from) return 1;
  return clamp((now.getTime() - from) / (until - from), 0, 1);
}

export function rateRatio(ratio: number, thresholds: PerformanceThresholds): Exclude<PerformanceRating, "too_early"> {
  if (ratio >= thresholds.excellent) return "excellent";
  if (ratio >= thresholds.good) return "good";
  if (ratio >= thresholds.acceptable) return "acceptable";
  return "poor";
}

/**
 * Compare actual sales with the expectation pro-rated over the elapsed window.
 * Retraction is advised when the margin fell under the floor, or when enough of the window
 * has passed and the ratio sits below the auto-retract threshold.
 */
export function assessPromotion(promotion: ActivePromotion, now: Date, settings: PerformanceSettings): PerformanceData {
  const fraction = elapsedFraction(promotion.valid_from, promotion.valid_until, now);
  const expectedUnits = promotion.expected_units_sold ?? 0;
  const expectedUnitsToDate = expectedUnits * fraction;
  const unitsSoldSoFar = promotion.actual_units_sold ?? 0;
  const revenueSoFar = promotion.actual_revenue ?? 0;

  const performanceRatio = expectedUnitsToDate > 0 ? roundTo(unitsSoldSoFar / expectedUnitsToDate, 4) : 0;
  const observable = fraction >= settings.thresholds.minObservedFraction && expectedUnitsToDate > 0;

  const margin = promotion.margin_percent;
  const marginMaintained = margin === undefined || margin >= settings.minMarginPercent;
  const isProfitable = margin === undefined || margin > 0;

  let retractReason: string | null = null;
  if (!marginMaintained) {
    retractReason = `Margin ${margin}% below floor ${settings.minMarginPercent}%`;
  } else if (observable && performanceRatio < settings.autoRetractThreshold) {
    retractReason = `Performance ratio ${performanceRatio.toFixed(2)} below retract threshold ${settings.autoRetractThreshold}`;
  }

  return {
    elapsedFraction: roundTo(fraction, 4),
    expectedUnitsToDate: roundTo(expectedUnitsToDate, 2),
    unitsSoldSoFar,
    revenueSoFar: roundTo(revenueSoFar, 2),
    performanceRatio,
    rating: observable ? rateRatio(performanceRatio, settings.thresholds) : "too_early",
    marginMaintained,
    isProfitable,
    retractReason,
  };
}
