import { finiteOr, roundTo } from "@pricing/kit";
import { ConfigurationError, ToolInvocationError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { ServiceNameSchema, type ToolInvoker } from "../types/tool-invoker.js";

const log = logger.createChild("dryRunTools");

const CATEGORIES = ["dairy", "beverages", "snacks", "frozen"] as const;
const COMPETITORS = ["FreshMart", "ValueGrocer", "CornerShop"] as const;
const CONDITIONS = ["sunny", "cloudy", "rain", "heatwave"] as const;

const WRITE_OPERATIONS = new Set([
  "log_agent_decision",
  "log_token_usage",
  "log_optimization_iteration",
  "log_evaluator_score",
  "log_performance_metric",
]);

interface StoredPromotion extends Record<string, unknown> {
  id: number;
  sku_id: number;
  store_id: number;
  promotion_code: string;
}

function idParam(parameters: Record<string, unknown>, key: string): number {
  return Math.max(1, Math.trunc(finiteOr(parameters[key], 1)));
}

function basePriceFor(skuId: number): number {
  return roundTo(2.99 + (skuId % 7) * 1.5, 2);
}

/**
 * In-process stand-in for the tool servers. Reads return synthetic data that is a pure
 * function of the sku/store ids; promotions created here are kept in memory so the
 * monitoring sweep has something to look at.
 */
export class DryRunToolInvoker implements ToolInvoker {
  private counter = 0;
  private readonly promotions = new Map<number, StoredPromotion>();

  async invoke(service: string, operation: string, parameters: Record<string, unknown>): Promise<unknown> {
    if (!ServiceNameSchema.safeParse(service).success) {
      throw new ConfigurationError(`Unknown tool service "${service}"`);
    }
    log.debug({ action: "DRY_RUN", service, operation }, "Dry-run: tool call");

    if (WRITE_OPERATIONS.has(operation)) {
      return { logged: true, id: this.nextId() };
    }

    switch (operation) {
      case "query_inventory_levels":
        return [this.inventory(idParam(parameters, "sku_id"), idParam(parameters, "store_id"))];
      case "calculate_sell_through_rate": {
        const days = idParam(parameters, "days");
        const avg = 4 + ((idParam(parameters, "sku_id") + idParam(parameters, "store_id")) % 9);
        return { avg_daily_sales: avg, total_units_sold: avg * days, days };
      }
      case "get_current_weather": {
        const storeId = idParam(parameters, "location_id");
        const temperature = 12 + ((storeId * 5) % 22);
        return {
          temperature_celsius: temperature,
          condition: temperature >= 30 ? "heatwave" : CONDITIONS[storeId % 3],
          is_extreme: temperature >= 30,
        };
      }
      case "get_competitor_prices": {
        const basePrice = basePriceFor(idParam(parameters, "sku_id"));
        return COMPETITORS.map((name, i) => ({
          competitor_name: name,
          price: roundTo(basePrice * (0.92 + i * 0.04), 2),
          promotion: i === 0,
        }));
      }
      case "check_sku_sentiment": {
        const category = typeof parameters.sku_category === "string" ? parameters.sku_category : "";
        const seed = category.length;
        return { has_buzz: seed % 5 === 0, overall_sentiment: 50 + ((seed * 7) % 40), trending_topics: [] };
      }
      case "get_latest_decision_prior":
        return null;
      case "get_historical_promotion_cases":
      case "get_approval_feedback":
        return [];
      case "create_decision_prior":
      case "create_pending_promotion":
        return { id: this.nextId(), status: "pending" };
      case "create_promotion":
        return this.createPromotion(parameters);
      case "get_active_promotions":
        return [...this.promotions.values()];
      case "retract_promotion": {
        const id = idParam(parameters, "promotion_id");
        const existed = this.promotions.delete(id);
        return { id, status: existed ? "retracted" : "not_found" };
      }
      default:
        throw new ToolInvocationError(service, operation, `Tool call failed: unknown tool ${operation}`);
    }
  }

  async close(): Promise<void> {
    this.promotions.clear();
  }

  private nextId(): number {
    this.counter++;
    return this.counter;
  }

  private inventory(skuId: number, storeId: number): Record<string, unknown> {
    const basePrice = basePriceFor(skuId);
    const quantity = 40 + ((skuId * 37 + storeId * 11) % 160);
    return {
      sku_id: skuId,
      store_id: storeId,
      sku_name: `SKU ${skuId}`,
      category: CATEGORIES[skuId % CATEGORIES.length],
      quantity,
      stock_status: quantity > 150 ? "overstocked" : quantity < 60 ? "low" : "normal",
      base_price: basePrice,
      base_cost: roundTo(basePrice * 0.6, 2),
    };
  }

  private createPromotion(parameters: Record<string, unknown>): { id: number; promotion_code: string; status: string } {
    const id = this.nextId();
    const promotion: StoredPromotion = {
      ...parameters,
      id,
      sku_id: idParam(parameters, "sku_id"),
      store_id: idParam(parameters, "store_id"),
      promotion_code: `DRY-${String(id).padStart(5, "0")}`,
      actual_units_sold: 0,
      actual_revenue: 0,
    };
    this.promotions.set(id, promotion);
    return { id, promotion_code: promotion.promotion_code, status: "active" };
  }
}
