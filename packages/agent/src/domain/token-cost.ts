import { roundTo } from "@pricing/kit";

export interface TokenRates {
  inputCostPer1M: number;
  outputCostPer1M: number;
}

/** USD cost of one completion, rounded to 6 decimals. */
export function computeTokenCost(promptTokens: number, completionTokens: number, rates: TokenRates): number {
  return roundTo(
    (promptTokens / 1_000_000) * rates.inputCostPer1M + (completionTokens / 1_000_000) * rates.outputCostPer1M,
    6,
  );
}
