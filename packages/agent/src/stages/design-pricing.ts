import { DEFAULT_BASE_COST, DEFAULT_BASE_PRICE, computePricing } from "../domain/pricing-math.js";
import { errorMessage } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { PRICING_SYSTEM_PROMPT, buildPricingPrompt } from "../prompts/build-pricing-prompt.js";
import type { PipelineState } from "../types/state.js";
import type { StageContext } from "./context.js";

const log = logger.createChild("designPricing");

export const AGENT_NAME = "Pricing Strategy Agent";
const REASONING_LIMIT = 300;

/**
 * Price arithmetic is deterministic; the model only writes the justification. When the
 * model call fails the strategy is still produced with a plain justification.
 */
export async function designPricing(state: PipelineState, ctx: StageContext): Promise<PipelineState> {
  const { skuId, storeId } = state;
  const { minMarginPercent, maxDiscountPercent } = ctx.settings.agent;
  const basePrice = state.inventoryData?.base_price ?? DEFAULT_BASE_PRICE;
  const baseCost = state.inventoryData?.base_cost ?? DEFAULT_BASE_COST;
  const competitorPrices = (state.competitorData ?? []).flatMap((c) => (c.price === undefined ? [] : [c.price]));

  const numbers = computePricing({ basePrice, baseCost, competitorPrices, minMarginPercent, maxDiscountPercent });
  const fallbackReasoning = `Undercut lowest competitor ($${numbers.lowestCompetitorPrice.toFixed(2)}) while holding a ${minMarginPercent}% margin floor`;

  let reasoning = fallbackReasoning;
  let error: string | undefined;
  try {
    const completion = await ctx.llm.complete(
      PRICING_SYSTEM_PROMPT,
      buildPricingPrompt({
        basePrice,
        baseCost,
        lowestCompetitorPrice: numbers.lowestCompetitorPrice,
        promotionalPrice: numbers.promotionalPrice,
        discountPercent: numbers.discountPercent,
        marginPercent: numbers.marginPercent,
        minMarginPercent,
        maxDiscountPercent,
        analysisReasoning: state.analysisResult?.reasoning,
        priors: state.decisionPriors,
      }),
    );
    await ctx.ledger.recordTokenUsage({
      agentName: AGENT_NAME,
      operation: "calculate_optimal_price",
      completion,
      skuId,
      context: { store_id: storeId },
    });
    reasoning = completion.text.trim().slice(0, REASONING_LIMIT) || fallbackReasoning;
  } catch (err) {
    error = errorMessage(err);
    log.warn({ action: "designPricing", skuId, storeId, err: error }, "Pricing justification call failed");
  }

  log.info(
    { action: "designPricing", skuId, storeId, promotionalPrice: numbers.promotionalPrice, discountPercent: numbers.discountPercent, marginPercent: numbers.marginPercent },
    "Pricing designed",
  );
  return {
    ...state,
    pricingStrategy: { ...numbers, reasoning },
    ...(error !== undefined ? { error } : {}),
  };
}
