import { assessPromotion } from "../domain/promotion-performance.js";
import { logger } from "../lib/logger.js";
import type { MonitoringState } from "../types/state.js";
import type { StageContext } from "./context.js";

const log = logger.createChild("monitor");

/** Rates an active promotion against its pro-rated expectation and decides on retraction. */
export async function monitorPromotion(state: MonitoringState, ctx: StageContext): Promise<MonitoringState> {
  const { promotion } = state;
  if (!promotion) return state;

  const { agent, performanceThresholds } = ctx.settings;
  const performanceData = assessPromotion(promotion, ctx.now(), {
    thresholds: performanceThresholds,
    autoRetractThreshold: agent.autoRetractThreshold,
    minMarginPercent: agent.minMarginPercent,
  });
  const shouldRetract = performanceData.retractReason !== null;

  await ctx.ledger.recordPerformanceMetric(state.promotionId, performanceData);

  log.info(
    { action: "monitor", promotionId: state.promotionId, rating: performanceData.rating, performanceRatio: performanceData.performanceRatio, shouldRetract },
    "Promotion checked",
  );
  return { ...state, performanceData, shouldRetract };
}
