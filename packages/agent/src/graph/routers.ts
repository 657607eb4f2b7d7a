import type { FeatureFlags } from "../types/config.js";
import type { MonitoringState, PipelineState } from "../types/state.js";
import { END } from "./state-graph.js";

/** Routing reads only the run's flag snapshot, never live configuration. */
export interface RoutingContext {
  flags: FeatureFlags;
}

export const PricingNode = {
  collectData: "collect_data",
  analyzeMarket: "analyze_market",
  loadDecisionPriors: "load_decision_priors",
  designPricing: "design_pricing",
  designPromotion: "design_promotion",
  optimizeOffer: "optimize_offer",
  multiCriticReview: "multi_critic_review",
  executePromotion: "execute_promotion",
} as const;

export type PricingNodeName = (typeof PricingNode)[keyof typeof PricingNode];

export const MonitoringNode = {
  monitor: "monitor",
  retract: "retract",
} as const;

export type MonitoringNodeName = (typeof MonitoringNode)[keyof typeof MonitoringNode];

export function afterAnalysis(state: PipelineState): string {
  return state.shouldAct === true ? PricingNode.loadDecisionPriors : END;
}

export function postDesign(state: PipelineState, ctx: RoutingContext): string {
  if (!state.promotionDesign) return END;
  if (ctx.flags.enableOptimizationLoop) return PricingNode.optimizeOffer;
  if (ctx.flags.enableMultiCritic) return PricingNode.multiCriticReview;
  return PricingNode.executePromotion;
}

export function postOptimization(state: PipelineState, ctx: RoutingContext): string {
  if (!state.promotionDesign) return END;
  return ctx.flags.enableMultiCritic ? PricingNode.multiCriticReview : PricingNode.executePromotion;
}

export function postCritic(state: PipelineState): string {
  if (!state.promotionDesign || state.criticDecision?.action === "reject") return END;
  return PricingNode.executePromotion;
}

export function afterMonitor(state: MonitoringState): string {
  return state.shouldRetract === true ? MonitoringNode.retract : END;
}
