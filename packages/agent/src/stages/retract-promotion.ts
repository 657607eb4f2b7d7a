import { z } from "zod";
import { errorMessage } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import type { MonitoringState } from "../types/state.js";
import type { StageContext } from "./context.js";

const log = logger.createChild("retract");

export const AGENT_NAME = "Monitoring Agent";
const DEFAULT_REASON = "Performance below threshold or margin compromised";

export async function retractPromotion(state: MonitoringState, ctx: StageContext): Promise<MonitoringState> {
  const reason = state.performanceData?.retractReason ?? DEFAULT_REASON;
  try {
    const result = z
      .record(z.unknown())
      .nullish()
      .parse(await ctx.tools.invoke("postgres", "retract_promotion", { promotion_id: state.promotionId, reason }));

    await ctx.ledger.recordDecision({
      agentName: AGENT_NAME,
      skuId: state.skuId,
      storeId: state.storeId,
      decisionType: "retract_promotion",
      reasoning: reason,
      dataUsed: state.performanceData ?? {},
      outcome: "retracted",
      promotionId: state.promotionId,
    });

    log.info({ action: "retract", promotionId: state.promotionId, reason }, "Promotion retracted");
    return { ...state, retractionResult: result ?? {} };
  } catch (err) {
    log.warn({ action: "retract", promotionId: state.promotionId, err: errorMessage(err) }, "Retraction failed");
    return { ...state, error: errorMessage(err) };
  }
}
