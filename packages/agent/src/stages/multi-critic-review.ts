import { bypassedDecision, reviewProposal } from "../domain/critic-arbitrator.js";
import { logger } from "../lib/logger.js";
import type { PipelineState } from "../types/state.js";
import type { StageContext } from "./context.js";

const log = logger.createChild("multiCritic");

export const AGENT_NAME = "Multi-Critic Review Agent";

export async function multiCriticReview(state: PipelineState, ctx: StageContext): Promise<PipelineState> {
  const { skuId, storeId } = state;

  if (!ctx.flags.enableMultiCritic) {
    return { ...state, criticEvaluations: [], criticDecision: bypassedDecision() };
  }

  const { agent, critic } = ctx.settings;
  const review = reviewProposal(
    state.promotionDesign,
    { baseCost: state.inventoryData?.base_cost ?? 0, avgDailySales: state.sellThroughRate?.avg_daily_sales },
    { minMarginPercent: agent.minMarginPercent, maxDiscountPercent: agent.maxDiscountPercent, thresholds: critic },
  );

  for (const evaluation of review.evaluations) {
    await ctx.ledger.recordEvaluatorScore(skuId, storeId, evaluation, review.decision.action);
  }
  await ctx.ledger.recordDecision({
    agentName: AGENT_NAME,
    skuId,
    storeId,
    decisionType: "multi_critic_review",
    reasoning: review.decision.reason,
    dataUsed: { evaluations: review.evaluations, averageScore: review.decision.averageScore },
    outcome: review.decision.action,
  });

  log.info({ action: "multiCriticReview", skuId, storeId, decision: review.decision.action, averageScore: review.decision.averageScore }, "Proposal reviewed");
  return {
    ...state,
    criticEvaluations: review.evaluations,
    criticDecision: review.decision,
    ...(review.revisedProposal ? { promotionDesign: review.revisedProposal } : {}),
  };
}
