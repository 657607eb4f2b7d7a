import type {
  CompetitorPrice,
  InventorySnapshot,
  SellThroughSnapshot,
  SocialSnapshot,
  WeatherSnapshot,
} from "../types/state.js";

export const ANALYSIS_SYSTEM_PROMPT =
  "You are an expert market analyst for retail pricing. Analyze data and make decisions.";

export interface AnalysisInputs {
  inventory: InventorySnapshot;
  sellThrough: SellThroughSnapshot | undefined;
  weather: WeatherSnapshot | undefined;
  competitors: readonly CompetitorPrice[];
  social: SocialSnapshot | undefined;
}

export function formatCompetitors(competitors: readonly CompetitorPrice[]): string {
  if (competitors.length === 0) return "No competitor data available";
  return competitors
    .slice(0, 3)
    .map((c) => `- ${c.competitor_name ?? "unknown"}: $${(c.price ?? 0).toFixed(2)} (${c.promotion ? "PROMO" : "Regular"})`)
    .join("\n");
}

export function buildAnalysisPrompt(inputs: AnalysisInputs): string {
  const { inventory, sellThrough, weather, competitors, social } = inputs;
  return `Analyze the following market data and determine if we should take action (create a promotion):

Inventory Status:
- Current Stock: ${inventory.quantity ?? 0} units
- Stock Status: ${inventory.stock_status ?? "unknown"}
- 7-Day Sell-Through: ${sellThrough?.avg_daily_sales ?? 0} units/day

Weather Conditions:
- Temperature: ${weather?.temperature_celsius ?? 0}°C
- Condition: ${weather?.condition ?? "unknown"}
- Extreme Weather: ${weather?.is_extreme ?? false}

Competitor Pricing:
${formatCompetitors(competitors)}

Social Trends:
- Has Buzz: ${social?.has_buzz ?? false}
- Sentiment Score: ${social?.overall_sentiment ?? 50}/100
- Trending Topics: ${(social?.trending_topics ?? []).join(", ") || "none"}

Decision Criteria:
1. Excess inventory + demand opportunity = CREATE PROMOTION
2. Low sell-through + favorable conditions = CREATE PROMOTION
3. Competitor promotion + we're overpriced = CREATE PROMOTION
4. Otherwise = NO ACTION

Respond with JSON only:
{"should_act": true/false, "reasoning": "explanation", "opportunity_score": 0-100, "key_factors": ["factor1", "factor2"]}`;
}
