import { z } from "zod";
import { errorMessage } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import type { PipelineState, PromotionDesign } from "../types/state.js";
import type { StageContext } from "./context.js";

const log = logger.createChild("executePromotion");

export const AGENT_NAME = "Execution Agent";

const CreatedRowSchema = z
  .object({
    id: z.coerce.number().int().nullish(),
    promotion_code: z.string().nullish(),
  })
  .passthrough()
  .nullish();

function promotionParams(design: PromotionDesign): Record<string, unknown> {
  return {
    promotion_type: design.promotionType,
    discount_type: design.discountType,
    discount_value: design.discountValue,
    original_price: design.originalPrice,
    promotional_price: design.promotionalPrice,
    margin_percent: design.marginPercent,
    target_radius_km: design.targetRadiusKm,
    expected_units_sold: design.expectedUnitsSold,
    expected_revenue: design.expectedRevenue,
  };
}

/** Commits the proposal: a pending promotion under manual approval, otherwise an active one. */
export async function executePromotion(state: PipelineState, ctx: StageContext): Promise<PipelineState> {
  const { skuId, storeId } = state;
  const design = state.promotionDesign;
  if (!design) return state;

  try {
    if (ctx.settings.agent.requireManualApproval) {
      const pending = CreatedRowSchema.parse(
        await ctx.tools.invoke("postgres", "create_pending_promotion", {
          sku_id: skuId,
          store_id: storeId,
          ...promotionParams(design),
          proposed_valid_from: design.validFrom,
          proposed_valid_until: design.validUntil,
          agent_reasoning: design.reason,
          market_data: {
            inventory: state.inventoryData ?? {},
            weather: state.weatherData ?? {},
            competitors: state.competitorData ?? [],
            social: state.socialData ?? {},
          },
        }),
      );
      if (!pending) throw new Error("Failed to create pending promotion: empty response");

      await ctx.ledger.recordDecision({
        agentName: AGENT_NAME,
        skuId,
        storeId,
        decisionType: "create_promotion",
        reasoning: design.reason,
        dataUsed: design,
        outcome: "pending_approval",
      });
      log.info({ action: "executePromotion", skuId, storeId, pendingPromotionId: pending.id }, "Promotion queued for approval");
      return {
        ...state,
        executionResult: {
          status: "pending_approval",
          pendingPromotionId: pending.id ?? null,
          message: "Promotion requires manual approval",
        },
      };
    }

    const created = CreatedRowSchema.parse(
      await ctx.tools.invoke("postgres", "create_promotion", {
        sku_id: skuId,
        store_id: storeId,
        ...promotionParams(design),
        valid_from: design.validFrom,
        valid_until: design.validUntil,
        reason: design.reason,
      }),
    );
    if (!created) throw new Error("Failed to create promotion: empty response");
    const promotionId = created.id ?? null;

    await ctx.ledger.recordDecision({
      agentName: AGENT_NAME,
      skuId,
      storeId,
      decisionType: "create_promotion",
      reasoning: design.reason,
      dataUsed: design,
      outcome: "executed",
      promotionId,
    });
    log.info({ action: "executePromotion", skuId, storeId, promotionId, promotionCode: created.promotion_code }, "Promotion active");
    return {
      ...state,
      executionResult: { status: "active", promotionId, promotionCode: created.promotion_code ?? null },
      ...(promotionId !== null ? { promotionId } : {}),
    };
  } catch (err) {
    log.warn({ action: "executePromotion", skuId, storeId, err: errorMessage(err) }, "Promotion execution failed");
    return { ...state, error: errorMessage(err) };
  }
}
