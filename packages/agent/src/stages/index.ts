import type { MonitoringStages } from "../graph/monitoring-graph.js";
import type { PricingStages } from "../graph/pricing-graph.js";
import { analyzeMarket } from "./analyze-market.js";
import { collectData } from "./collect-data.js";
import type { StageContext } from "./context.js";
import { designPricing } from "./design-pricing.js";
import { designPromotion } from "./design-promotion.js";
import { executePromotion } from "./execute-promotion.js";
import { loadDecisionPriors } from "./load-decision-priors.js";
import { monitorPromotion } from "./monitor-promotion.js";
import { multiCriticReview } from "./multi-critic-review.js";
import { optimizeOffer } from "./optimize-offer.js";
import { retractPromotion } from "./retract-promotion.js";

export { stageSettings, type StageContext, type StageSettings } from "./context.js";
export { DecisionLedger } from "./decision-ledger.js";

export const pricingStages: PricingStages<StageContext> = {
  collect_data: collectData,
  analyze_market: analyzeMarket,
  load_decision_priors: loadDecisionPriors,
  design_pricing: designPricing,
  design_promotion: designPromotion,
  optimize_offer: optimizeOffer,
  multi_critic_review: multiCriticReview,
  execute_promotion: executePromotion,
};

export const monitoringStages: MonitoringStages<StageContext> = {
  monitor: monitorPromotion,
  retract: retractPromotion,
};
