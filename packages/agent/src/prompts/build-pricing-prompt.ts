import type { DecisionPriors } from "../types/state.js";

export const PRICING_SYSTEM_PROMPT =
  "You are a pricing strategy expert. Explain the promotional price in two or three sentences, keeping margin safety in view.";

export interface PricingPromptInputs {
  basePrice: number;
  baseCost: number;
  lowestCompetitorPrice: number;
  promotionalPrice: number;
  discountPercent: number;
  marginPercent: number;
  minMarginPercent: number;
  maxDiscountPercent: number;
  analysisReasoning: string | undefined;
  priors: DecisionPriors | undefined;
}

function describePriors(priors: DecisionPriors | undefined): string {
  if (!priors || priors.status !== "loaded") return "No historical priors available.";
  const p = priors.priors;
  const flags = p.riskFlags.length > 0 ? p.riskFlags.join(", ") : "none";
  return [
    `- Success probability: ${p.successProbability} (confidence ${p.confidence})`,
    `- Expected ROI band: ${p.expectedRoiBand}`,
    `- Recommended discount range: ${p.recommendedDiscountRange.minPercent}% to ${p.recommendedDiscountRange.maxPercent}%`,
    `- Risk flags: ${flags}`,
  ].join("\n");
}

export function buildPricingPrompt(inputs: PricingPromptInputs): string {
  return `Explain this promotional pricing decision:

Current Situation:
- Our Base Price: $${inputs.basePrice.toFixed(2)}
- Our Cost: $${inputs.baseCost.toFixed(2)}
- Lowest Competitor: $${inputs.lowestCompetitorPrice.toFixed(2)}
- Min Margin Required: ${inputs.minMarginPercent}%
- Max Discount Allowed: ${inputs.maxDiscountPercent}%

Proposed Price:
- Promotional Price: $${inputs.promotionalPrice.toFixed(2)}
- Discount: ${inputs.discountPercent}%
- Margin: ${inputs.marginPercent}%

Market Analysis:
${inputs.analysisReasoning ?? "Action recommended"}

Historical Priors:
${describePriors(inputs.priors)}`;
}
