import { clamp, roundTo } from "@pricing/kit";
import type { PromotionDefaults } from "../types/config.js";
import type { PricingStrategy, PromotionDesign, PromotionType } from "../types/state.js";

export const DEFAULT_BASE_PRICE = 5.99;
export const DEFAULT_BASE_COST = 3.5;
export const DEFAULT_AVG_DAILY_SALES = 10;
/** Target price = lowest competitor price * COMPETITOR_UNDERCUT. */
export const COMPETITOR_UNDERCUT = 0.95;

const DEMAND_MULTIPLIER: Record<PromotionType, number> = {
  flash_sale: 2.5,
  discount: 1.5,
};

export interface PricingInputs {
  basePrice: number;
  baseCost: number;
  competitorPrices: number[];
  minMarginPercent: number;
  maxDiscountPercent: number;
}

export type PricingNumbers = Omit<PricingStrategy, "reasoning">;

function marginOf(price: number, cost: number): number {
  return price > 0 ? ((price - cost) / price) * 100 : 0;
}

/**
 * Undercut the cheapest competitor, lift the price back to the margin floor when needed,
 * then keep the discount inside [0, maxDiscount] (repricing from the base price if clamped).
 */
export function computePricing(inputs: PricingInputs): PricingNumbers {
  const { basePrice, baseCost, minMarginPercent, maxDiscountPercent } = inputs;
  const valid = inputs.competitorPrices.filter((p) => Number.isFinite(p) && p > 0);
  const lowestCompetitorPrice = valid.length > 0 ? Math.min(...valid) : basePrice;

  let price = lowestCompetitorPrice * COMPETITOR_UNDERCUT;
  let margin = marginOf(price, baseCost);
  if (margin < minMarginPercent) {
    price = baseCost / (1 - minMarginPercent / 100);
    margin = minMarginPercent;
  }

  const rawDiscount = basePrice > 0 ? ((basePrice - price) / basePrice) * 100 : 0;
  const discount = clamp(rawDiscount, 0, maxDiscountPercent);
  if (discount !== rawDiscount) {
    price = basePrice * (1 - discount / 100);
    margin = marginOf(price, baseCost);
  }

  return {
    originalPrice: basePrice,
    baseCost,
    lowestCompetitorPrice,
    promotionalPrice: roundTo(price, 2),
    discountPercent: roundTo(discount, 1),
    marginPercent: roundTo(margin, 2),
  };
}

export interface PromotionInputs {
  pricing: PricingStrategy;
  extremeWeather: boolean;
  socialBuzz: boolean;
  avgDailySales: number | undefined;
  defaults: PromotionDefaults;
  now: Date;
}

/** Flash sale on extreme weather or social buzz, otherwise a day-long discount. */
export function designPromotion(inputs: PromotionInputs): PromotionDesign {
  const { pricing, defaults, now } = inputs;
  const promotionType: PromotionType = inputs.extremeWeather || inputs.socialBuzz ? "flash_sale" : "discount";
  const durationHours = promotionType === "flash_sale" ? defaults.flashSaleDurationHours : defaults.discountDurationHours;

  const avgDaily = inputs.avgDailySales ?? DEFAULT_AVG_DAILY_SALES;
  const expectedUnitsSold = Math.max(0, Math.floor(avgDaily * DEMAND_MULTIPLIER[promotionType] * (durationHours / 24)));
  const validUntil = new Date(now.getTime() + durationHours * 3_600_000);

  return {
    promotionType,
    discountType: "percentage",
    discountValue: pricing.discountPercent,
    originalPrice: pricing.originalPrice,
    promotionalPrice: pricing.promotionalPrice,
    marginPercent: pricing.marginPercent,
    validFrom: now.toISOString(),
    validUntil: validUntil.toISOString(),
    targetRadiusKm: defaults.targetRadiusKm,
    expectedUnitsSold,
    expectedRevenue: roundTo(expectedUnitsSold * pricing.promotionalPrice, 2),
    reason: `${promotionType.toUpperCase()}: ${pricing.reasoning || "Market opportunity detected"}`,
  };
}
