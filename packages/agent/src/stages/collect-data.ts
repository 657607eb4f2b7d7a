import { z } from "zod";
import { errorMessage } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import {
  CompetitorPriceSchema,
  InventorySnapshotSchema,
  SellThroughSnapshotSchema,
  SocialSnapshotSchema,
  WeatherSnapshotSchema,
  type PipelineState,
} from "../types/state.js";
import type { StageContext } from "./context.js";

const log = logger.createChild("collectData");

export const AGENT_NAME = "Data Collector Agent";
const SELL_THROUGH_DAYS = 7;
const DEFAULT_CATEGORY = "food";

/**
 * Gathers every observation for the target. Fields are written only when all calls
 * succeed; a failure leaves them absent and records `error`.
 */
export async function collectData(state: PipelineState, ctx: StageContext): Promise<PipelineState> {
  const { skuId, storeId } = state;
  const { tools } = ctx;

  try {
    const inventoryRows = z
      .array(InventorySnapshotSchema)
      .nullish()
      .parse(await tools.invoke("postgres", "query_inventory_levels", { sku_id: skuId, store_id: storeId }));
    const sellThroughRate = SellThroughSnapshotSchema.nullish().parse(
      await tools.invoke("postgres", "calculate_sell_through_rate", { sku_id: skuId, store_id: storeId, days: SELL_THROUGH_DAYS }),
    );
    const weatherData = WeatherSnapshotSchema.nullish().parse(
      await tools.invoke("weather", "get_current_weather", { location_id: storeId }),
    );
    const competitorData = z
      .array(CompetitorPriceSchema)
      .nullish()
      .parse(await tools.invoke("competitor", "get_competitor_prices", { sku_id: skuId, location_id: storeId }));

    const inventoryData = inventoryRows?.[0];
    const socialData = inventoryData
      ? SocialSnapshotSchema.nullish().parse(
          await tools.invoke("social", "check_sku_sentiment", { sku_category: inventoryData.category ?? DEFAULT_CATEGORY }),
        )
      : undefined;

    const next: PipelineState = {
      ...state,
      inventoryData,
      sellThroughRate: sellThroughRate ?? undefined,
      weatherData: weatherData ?? undefined,
      competitorData: competitorData ?? [],
      socialData: socialData ?? undefined,
    };

    await ctx.ledger.recordDecision({
      agentName: AGENT_NAME,
      skuId,
      storeId,
      decisionType: "collect_data",
      reasoning: inventoryData ? "Data collection completed" : "Data collection completed without inventory",
      dataUsed: {
        inventory: next.inventoryData ?? {},
        weather: next.weatherData ?? {},
        competitor: next.competitorData,
        social: next.socialData ?? {},
      },
      outcome: "data_collected",
    });

    log.info({ action: "collectData", skuId, storeId, hasInventory: inventoryData !== undefined, competitors: next.competitorData?.length }, "Data collected");
    return next;
  } catch (err) {
    log.warn({ action: "collectData", skuId, storeId, err: errorMessage(err) }, "Data collection failed");
    return { ...state, error: errorMessage(err) };
  }
}
