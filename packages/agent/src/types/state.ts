import { z } from "zod";
import { finiteOr } from "@pricing/kit";
import { OptimizationObjectiveSchema } from "./config.js";

// ---------------------------------------------------------------------------
// Observation snapshots (wire rows from the tool services, snake_case)
// DECIMAL columns arrive as strings, so numeric fields are coerced leniently.
// ---------------------------------------------------------------------------
const decimal = z.unknown().transform((v): number | undefined => {
  const n = finiteOr(v, Number.NaN);
  return Number.isNaN(n) ? undefined : n;
});

export const InventorySnapshotSchema = z.object({
  sku_id: decimal,
  store_id: decimal,
  sku_name: z.string().optional(),
  category: z.string().optional(),
  quantity: decimal,
  stock_status: z.string().optional(),
  base_price: decimal,
  base_cost: decimal,
}).passthrough();

export const SellThroughSnapshotSchema = z.object({
  avg_daily_sales: decimal,
  total_units_sold: decimal,
  days: decimal,
}).passthrough();

export const WeatherSnapshotSchema = z.object({
  temperature_celsius: decimal,
  condition: z.string().optional(),
  is_extreme: z.boolean().optional(),
}).passthrough();

export const CompetitorPriceSchema = z.object({
  competitor_name: z.string().optional(),
  price: decimal,
  promotion: z.unknown().optional(),
}).passthrough();

export const SocialSnapshotSchema = z.object({
  has_buzz: z.boolean().optional(),
  overall_sentiment: decimal,
  trending_topics: z.array(z.string()).optional(),
}).passthrough();

export type InventorySnapshot = z.infer<typeof InventorySnapshotSchema>;
export type SellThroughSnapshot = z.infer<typeof SellThroughSnapshotSchema>;
export type WeatherSnapshot = z.infer<typeof WeatherSnapshotSchema>;
export type CompetitorPrice = z.infer<typeof CompetitorPriceSchema>;
export type SocialSnapshot = z.infer<typeof SocialSnapshotSchema>;

// ---------------------------------------------------------------------------
// Stage outputs
// ---------------------------------------------------------------------------
export const AnalysisResultSchema = z.object({
  shouldAct: z.boolean(),
  reasoning: z.string(),
  opportunityScore: z.number().nullable(),
  keyFactors: z.array(z.string()),
  // LLM reply could not be read as a verdict; shouldAct is false but the market was never judged
  parseFailed: z.boolean(),
});

export const RoiBandSchema = z.enum(["low", "medium", "high"]);

export const LearnedPriorsSchema = z.object({
  successProbability: z.number().min(0).max(1),
  confidence: z.number().min(0).max(1),
  expectedRoiBand: RoiBandSchema,
  riskFlags: z.array(z.string()),
  recommendedDiscountRange: z.object({ minPercent: z.number(), maxPercent: z.number() }),
  evidence: z.object({
    historicalCases: z.number().int().nonnegative(),
    successfulCases: z.number().int().nonnegative(),
    feedbackSignals: z.number().int().nonnegative(),
    approvalRate: z.number().nullable(),
    averageMarginPercent: z.number(),
    averageDiscountPercent: z.number(),
    averagePerformanceRatio: z.number(),
  }),
  generatedAt: z.string(),
});

/** "disabled" is the empty result when learning is off; "unavailable" means no history to learn from. */
export const DecisionPriorsSchema = z.discriminatedUnion("status", [
  z.object({ status: z.literal("disabled") }),
  z.object({ status: z.literal("unavailable") }),
  z.object({
    status: z.literal("loaded"),
    source: z.enum(["cache", "generated"]),
    priorId: z.number().nullable(),
    priors: LearnedPriorsSchema,
  }),
]);

export const PricingStrategySchema = z.object({
  originalPrice: z.number(),
  baseCost: z.number(),
  lowestCompetitorPrice: z.number(),
  promotionalPrice: z.number(),
  discountPercent: z.number(),
  marginPercent: z.number(),
  reasoning: z.string(),
});

export const PromotionTypeSchema = z.enum(["flash_sale", "discount"]);

export const PromotionDesignSchema = z.object({
  promotionType: PromotionTypeSchema,
  discountType: z.literal("percentage"),
  discountValue: z.number(),
  originalPrice: z.number(),
  promotionalPrice: z.number(),
  marginPercent: z.number(),
  validFrom: z.string(),
  validUntil: z.string(),
  targetRadiusKm: z.number(),
  expectedUnitsSold: z.number().int(),
  expectedRevenue: z.number(),
  reason: z.string(),
});

export const ConstraintChecksSchema = z.object({
  marginOk: z.boolean(),
  discountOk: z.boolean(),
  nonNegativeDiscount: z.boolean(),
});

export const OptimizationIterationSchema = z.object({
  index: z.number().int().nonnegative(),
  objectiveName: OptimizationObjectiveSchema,
  objectiveScore: z.number(),
  candidateOffer: PromotionDesignSchema,
  constraintsSatisfied: ConstraintChecksSchema,
  isSelected: z.boolean(),
});

export const OptimizationResultSchema = z.object({
  enabled: z.boolean(),
  iterations: z.number().int().nonnegative(),
  selectedIteration: z.number().int().nonnegative().nullable(),
  selectedObjectiveScore: z.number().nullable(),
  objective: OptimizationObjectiveSchema,
  note: z.string().optional(),
});

export const RecommendationSchema = z.enum(["approve", "revise", "reject"]);

export const CriticEvaluationSchema = z.object({
  evaluatorName: z.string(),
  score: z.number().min(0).max(100),
  rationale: z.string(),
  riskFlags: z.array(z.string()),
  recommendation: RecommendationSchema,
});

export const CriticDecisionSchema = z.object({
  enabled: z.boolean(),
  action: RecommendationSchema,
  averageScore: z.number().nullable(),
  reason: z.string(),
});

export const ExecutionResultSchema = z.discriminatedUnion("status", [
  z.object({
    status: z.literal("active"),
    promotionId: z.number().nullable(),
    promotionCode: z.string().nullable(),
  }),
  z.object({
    status: z.literal("pending_approval"),
    pendingPromotionId: z.number().nullable(),
    message: z.string(),
  }),
]);

// ---------------------------------------------------------------------------
// Pipeline state: one record threaded through a pricing graph run.
// strict() turns a misspelled key into a validation error instead of an absent field.
// ---------------------------------------------------------------------------
export const PipelineStateSchema = z.object({
  skuId: z.number().int().positive(),
  storeId: z.number().int().positive(),

  inventoryData: InventorySnapshotSchema.optional(),
  weatherData: WeatherSnapshotSchema.optional(),
  competitorData: z.array(CompetitorPriceSchema).optional(),
  socialData: SocialSnapshotSchema.optional(),
  sellThroughRate: SellThroughSnapshotSchema.optional(),

  analysisResult: AnalysisResultSchema.optional(),
  shouldAct: z.boolean().optional(),

  decisionPriors: DecisionPriorsSchema.optional(),

  pricingStrategy: PricingStrategySchema.optional(),
  promotionDesign: PromotionDesignSchema.optional(),

  optimizationResult: OptimizationResultSchema.optional(),
  optimizationIterations: z.array(OptimizationIterationSchema).optional(),

  criticEvaluations: z.array(CriticEvaluationSchema).optional(),
  criticDecision: CriticDecisionSchema.optional(),

  executionResult: ExecutionResultSchema.optional(),
  promotionId: z.number().int().optional(),

  error: z.string().optional(),
}).strict();

export const ActivePromotionSchema = z.object({
  id: z.coerce.number().int(),
  sku_id: z.coerce.number().int(),
  store_id: z.coerce.number().int(),
  promotion_code: z.string().optional(),
  promotion_type: z.string().optional(),
  discount_value: decimal,
  original_price: decimal,
  promotional_price: decimal,
  margin_percent: decimal,
  valid_from: z.string().optional(),
  valid_until: z.string().optional(),
  expected_units_sold: decimal,
  expected_revenue: decimal,
  actual_units_sold: decimal,
  actual_revenue: decimal,
}).passthrough();

export const PerformanceRatingSchema = z.enum(["excellent", "good", "acceptable", "poor", "too_early"]);

export const PerformanceDataSchema = z.object({
  elapsedFraction: z.number(),
  expectedUnitsToDate: z.number(),
  unitsSoldSoFar: z.number(),
  revenueSoFar: z.number(),
  performanceRatio: z.number(),
  rating: PerformanceRatingSchema,
  marginMaintained: z.boolean(),
  isProfitable: z.boolean(),
  retractReason: z.string().nullable(),
});

export const MonitoringStateSchema = z.object({
  promotionId: z.number().int(),
  skuId: z.number().int(),
  storeId: z.number().int(),
  promotion: ActivePromotionSchema.optional(),
  performanceData: PerformanceDataSchema.optional(),
  shouldRetract: z.boolean().optional(),
  retractionResult: z.record(z.unknown()).optional(),
  error: z.string().optional(),
}).strict();

export type AnalysisResult = z.infer<typeof AnalysisResultSchema>;
export type RoiBand = z.infer<typeof RoiBandSchema>;
export type DecisionPriors = z.infer<typeof DecisionPriorsSchema>;
export type LearnedPriors = z.infer<typeof LearnedPriorsSchema>;
export type PricingStrategy = z.infer<typeof PricingStrategySchema>;
export type PromotionType = z.infer<typeof PromotionTypeSchema>;
export type PromotionDesign = z.infer<typeof PromotionDesignSchema>;
export type ConstraintChecks = z.infer<typeof ConstraintChecksSchema>;
export type OptimizationIteration = z.infer<typeof OptimizationIterationSchema>;
export type OptimizationResult = z.infer<typeof OptimizationResultSchema>;
export type Recommendation = z.infer<typeof RecommendationSchema>;
export type CriticEvaluation = z.infer<typeof CriticEvaluationSchema>;
export type CriticDecision = z.infer<typeof CriticDecisionSchema>;
export type ExecutionResult = z.infer<typeof ExecutionResultSchema>;
export type PipelineState = z.infer<typeof PipelineStateSchema>;
export type PipelineStateInput = z.input<typeof PipelineStateSchema>;
export type ActivePromotion = z.infer<typeof ActivePromotionSchema>;
export type PerformanceRating = z.infer<typeof PerformanceRatingSchema>;
export type PerformanceData = z.infer<typeof PerformanceDataSchema>;
export type MonitoringState = z.infer<typeof MonitoringStateSchema>;

/** Validates a fresh pricing-run state; unknown keys are rejected. */
export function createPipelineState(input: PipelineStateInput): PipelineState {
  return PipelineStateSchema.parse(input);
}

export function createMonitoringState(input: z.input<typeof MonitoringStateSchema>): MonitoringState {
  return MonitoringStateSchema.parse(input);
}
