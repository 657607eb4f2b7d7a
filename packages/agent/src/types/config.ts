import { z } from "zod";

export const OptimizationObjectiveSchema = z.enum([
  "profit_maximization",
  "inventory_reduction",
  "revenue_lift",
  "sell_through_acceleration",
]);

export const TargetsSchema = z.object({
  // empty = default range (1..defaultSkuCount / 1..defaultStoreCount)
  skus: z.array(z.number().int().positive()).default([]),
  stores: z.array(z.number().int().positive()).default([]),
  defaultSkuCount: z.number().int().nonnegative().default(20),
  defaultStoreCount: z.number().int().nonnegative().default(5),
});

export const AgentSettingsSchema = z.object({
  monitoringIntervalMinutes: z.number().positive().default(30),
  minMarginPercent: z.number().min(0).max(99).default(10),
  maxDiscountPercent: z.number().min(0).max(100).default(40),
  autoRetractThreshold: z.number().min(0).default(0.5),
  requireManualApproval: z.boolean().default(false),
  optimizationMaxIterations: z.number().int().default(3),
  optimizationObjective: OptimizationObjectiveSchema.default("profit_maximization"),
});

export const FeatureFlagsSchema = z.object({
  enableDecisionLearning: z.boolean().default(false),
  enableOptimizationLoop: z.boolean().default(false),
  enableMultiCritic: z.boolean().default(false),
  enableApprovalLearning: z.boolean().default(false),
});

export const CriticThresholdsSchema = z.object({
  reviseThreshold: z.number().min(0).max(100).default(65),
  rejectThreshold: z.number().min(0).max(100).default(45),
}).refine((t) => t.rejectThreshold <= t.reviseThreshold, {
  message: "rejectThreshold must not exceed reviseThreshold",
});

export const PromotionDefaultsSchema = z.object({
  flashSaleDurationHours: z.number().positive().default(2),
  discountDurationHours: z.number().positive().default(24),
  targetRadiusKm: z.number().positive().default(5),
});

export const PerformanceThresholdsSchema = z.object({
  excellent: z.number().positive().default(1.5),
  good: z.number().positive().default(1.0),
  acceptable: z.number().positive().default(0.7),
  // fraction of the validity window that must elapse before auto-retraction is considered
  minObservedFraction: z.number().min(0).max(1).default(0.25),
});

export const ToolServicesSchema = z.object({
  postgres: z.string().url().default("http://localhost:3000"),
  weather: z.string().url().default("http://localhost:3001"),
  competitor: z.string().url().default("http://localhost:3002"),
  social: z.string().url().default("http://localhost:3003"),
});

export const LlmSettingsSchema = z.object({
  model: z.string().min(1).default("claude-3-5-haiku-latest"),
  maxTokens: z.number().int().positive().default(1024),
  inputCostPer1M: z.number().nonnegative().default(0.8),
  outputCostPer1M: z.number().nonnegative().default(4),
});

export const SchedulerSettingsSchema = z.object({
  pauseCheckMs: z.number().int().positive().default(1_000),
  idlePollMs: z.number().int().positive().default(5_000),
  errorBackoffMs: z.number().int().positive().default(5_000),
  maxErrorBackoffMs: z.number().int().positive().default(60_000),
  interTargetDelayMs: z.number().int().nonnegative().default(1_000),
  errorHistoryLimit: z.number().int().positive().default(100),
  statusErrorTail: z.number().int().nonnegative().default(10),
});

export const AgentConfigSchema = z.object({
  port: z.number().int().positive().default(8000),
  dryRun: z.boolean().default(false),
  autoStart: z.boolean().default(false),
  targets: TargetsSchema.default({}),
  agent: AgentSettingsSchema.default({}),
  featureFlags: FeatureFlagsSchema.default({}),
  critic: CriticThresholdsSchema.default({}),
  promotionDefaults: PromotionDefaultsSchema.default({}),
  performanceThresholds: PerformanceThresholdsSchema.default({}),
  toolServices: ToolServicesSchema.default({}),
  toolTimeoutMs: z.number().int().positive().default(30_000),
  llm: LlmSettingsSchema.default({}),
  scheduler: SchedulerSettingsSchema.default({}),
  logLevels: z.record(z.string()).default({}),
});

export type OptimizationObjective = z.infer<typeof OptimizationObjectiveSchema>;
export type TargetsConfig = z.infer<typeof TargetsSchema>;
export type AgentSettings = z.infer<typeof AgentSettingsSchema>;
export type FeatureFlags = z.infer<typeof FeatureFlagsSchema>;
export type CriticThresholds = z.infer<typeof CriticThresholdsSchema>;
export type PromotionDefaults = z.infer<typeof PromotionDefaultsSchema>;
export type PerformanceThresholds = z.infer<typeof PerformanceThresholdsSchema>;
export type ToolServices = z.infer<typeof ToolServicesSchema>;
export type LlmSettings = z.infer<typeof LlmSettingsSchema>;
export type SchedulerSettings = z.infer<typeof SchedulerSettingsSchema>;
export type AgentConfig = z.infer<typeof AgentConfigSchema>;
