import { optimizeOffer as search } from "../domain/offer-optimizer.js";
import { logger } from "../lib/logger.js";
import type { PipelineState } from "../types/state.js";
import type { StageContext } from "./context.js";

const log = logger.createChild("optimizeOffer");

export const AGENT_NAME = "Offer Optimization Agent";
const FALLBACK_BASE_COST = 0.01;

export async function optimizeOffer(state: PipelineState, ctx: StageContext): Promise<PipelineState> {
  const { skuId, storeId } = state;
  const agent = ctx.settings.agent;
  const objective = agent.optimizationObjective;

  if (!ctx.flags.enableOptimizationLoop) {
    return {
      ...state,
      optimizationIterations: [],
      optimizationResult: {
        enabled: false,
        iterations: 0,
        selectedIteration: null,
        selectedObjectiveScore: null,
        objective,
        note: "Optimization loop disabled; original proposal kept.",
      },
    };
  }

  const proposal = state.promotionDesign;
  if (!proposal) {
    return {
      ...state,
      optimizationIterations: [],
      optimizationResult: {
        enabled: true,
        iterations: 0,
        selectedIteration: null,
        selectedObjectiveScore: null,
        objective,
        note: "No promotion design to optimize.",
      },
    };
  }

  const outcome = search(proposal, state.inventoryData?.base_cost ?? FALLBACK_BASE_COST, {
    objective,
    maxIterations: agent.optimizationMaxIterations,
    minMarginPercent: agent.minMarginPercent,
    maxDiscountPercent: agent.maxDiscountPercent,
  });

  for (const iteration of outcome.iterations) {
    await ctx.ledger.recordOptimizationIteration(skuId, storeId, iteration);
  }

  const { iterations, selectedIteration, selectedObjectiveScore } = outcome.result;
  await ctx.ledger.recordDecision({
    agentName: AGENT_NAME,
    skuId,
    storeId,
    decisionType: "offer_optimization",
    reasoning: `Completed ${iterations} optimization iterations. Selected iteration ${selectedIteration} with objective score ${(selectedObjectiveScore ?? 0).toFixed(2)}.`,
    dataUsed: { objective, maxIterations: agent.optimizationMaxIterations, selectedOffer: outcome.bestOffer },
    outcome: "optimized",
  });

  log.info({ action: "optimizeOffer", skuId, storeId, objective, iterations, selectedIteration, selectedObjectiveScore }, "Offer optimized");
  return {
    ...state,
    promotionDesign: outcome.bestOffer,
    optimizationIterations: outcome.iterations,
    optimizationResult: outcome.result,
  };
}
