import { designPromotion as buildDesign } from "../domain/pricing-math.js";
import { logger } from "../lib/logger.js";
import type { PipelineState } from "../types/state.js";
import type { StageContext } from "./context.js";

const log = logger.createChild("designPromotion");

export const AGENT_NAME = "Promotion Design Agent";

export async function designPromotion(state: PipelineState, ctx: StageContext): Promise<PipelineState> {
  const pricing = state.pricingStrategy;
  // no strategy means no design; the post-design router ends the run
  if (!pricing) return state;

  const promotionDesign = buildDesign({
    pricing,
    extremeWeather: state.weatherData?.is_extreme === true,
    socialBuzz: state.socialData?.has_buzz === true,
    avgDailySales: state.sellThroughRate?.avg_daily_sales,
    defaults: ctx.settings.promotionDefaults,
    now: ctx.now(),
  });

  await ctx.ledger.recordDecision({
    agentName: AGENT_NAME,
    skuId: state.skuId,
    storeId: state.storeId,
    decisionType: "promotion_design",
    reasoning: promotionDesign.reason,
    dataUsed: {
      pricingStrategy: pricing,
      weather: state.weatherData ?? {},
      social: state.socialData ?? {},
    },
    outcome: promotionDesign.promotionType,
  });

  log.info(
    { action: "designPromotion", skuId: state.skuId, storeId: state.storeId, promotionType: promotionDesign.promotionType, expectedUnitsSold: promotionDesign.expectedUnitsSold },
    "Promotion designed",
  );
  return { ...state, promotionDesign };
}
