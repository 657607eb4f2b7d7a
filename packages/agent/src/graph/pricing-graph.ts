import type { PipelineState } from "../types/state.js";
import {
  PricingNode,
  afterAnalysis,
  postCritic,
  postDesign,
  postOptimization,
  type PricingNodeName,
  type RoutingContext,
} from "./routers.js";
import { END, StateGraph, type CompiledGraph, type NodeFn } from "./state-graph.js";

export type PricingStages<C> = Record<PricingNodeName, NodeFn<PipelineState, C>>;
export type PricingGraph<C> = CompiledGraph<PipelineState, C>;

/**
 * collect_data -> analyze_market -> [act?] load_decision_priors -> design_pricing
 * -> design_promotion -> [flags] optimize_offer / multi_critic_review -> execute_promotion.
 * The edges are fixed; feature flags only change which routes the routers pick.
 */
export function buildPricingGraph<C extends RoutingContext>(stages: PricingStages<C>): PricingGraph<C> {
  const graph = new StateGraph<PipelineState, C>();
  for (const name of Object.values(PricingNode)) {
    graph.registerNode(name, stages[name]);
  }

  return graph
    .setEntry(PricingNode.collectData)
    .addEdge(PricingNode.collectData, PricingNode.analyzeMarket)
    .addConditionalEdge(PricingNode.analyzeMarket, afterAnalysis, [PricingNode.loadDecisionPriors, END])
    .addEdge(PricingNode.loadDecisionPriors, PricingNode.designPricing)
    .addEdge(PricingNode.designPricing, PricingNode.designPromotion)
    .addConditionalEdge(PricingNode.designPromotion, postDesign, [
      PricingNode.optimizeOffer,
      PricingNode.multiCriticReview,
      PricingNode.executePromotion,
      END,
    ])
    .addConditionalEdge(PricingNode.optimizeOffer, postOptimization, [
      PricingNode.multiCriticReview,
      PricingNode.executePromotion,
      END,
    ])
    .addConditionalEdge(PricingNode.multiCriticReview, postCritic, [PricingNode.executePromotion, END])
    .addEdge(PricingNode.executePromotion, END)
    .compile();
}
