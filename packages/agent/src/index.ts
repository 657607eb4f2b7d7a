// Types
export type {
  AgentConfig,
  AgentSettings,
  FeatureFlags,
  CriticThresholds,
  OptimizationObjective,
  SchedulerSettings,
} from "./types/config.js";
export { AgentConfigSchema, FeatureFlagsSchema } from "./types/config.js";
export type { PipelineState, MonitoringState, PromotionDesign, CriticDecision, CriticEvaluation } from "./types/state.js";
export { createPipelineState, createMonitoringState } from "./types/state.js";
export type { ToolInvoker } from "./types/tool-invoker.js";
export type { LlmClient, LlmCompletion } from "./types/llm-client.js";
export type { AgentEvent, EventType, EventSink } from "./types/events.js";

// Graph
export { StateGraph, CompiledGraph, END } from "./graph/state-graph.js";
export type { NodeFn, Router, RunOptions, RunResult, GraphDescription } from "./graph/state-graph.js";
export { buildPricingGraph } from "./graph/pricing-graph.js";
export { buildMonitoringGraph } from "./graph/monitoring-graph.js";

// Domain
export { buildTargets, parseIdList, type Target } from "./domain/targets.js";
export { computeStatusTargets } from "./domain/status-targets.js";
export { optimizeOffer } from "./domain/offer-optimizer.js";
export { reviewProposal, arbitrate } from "./domain/critic-arbitrator.js";

// Adapters
export { HttpToolInvoker } from "./adapters/http-tool-invoker.js";
export { DryRunToolInvoker } from "./adapters/dry-run-tool-invoker.js";
export { AnthropicLlmClient } from "./adapters/anthropic-llm-client.js";
export { DryRunLlmClient } from "./adapters/dry-run-llm-client.js";
export { EventLog } from "./adapters/event-log.js";

// Application
export { PricingRunner } from "./application/pricing-runner.js";
export type { PricingRunSummary, MonitoringSummary, PricingWork } from "./application/pricing-runner.js";
export { CycleScheduler } from "./application/cycle-scheduler.js";
export type { SchedulerStatus, ControlResult, CycleStepOutcome } from "./application/cycle-scheduler.js";
export { FeatureFlagStore } from "./application/feature-flags.js";
export { RuntimeTracker } from "./application/runtime-tracker.js";
export { createApp } from "./create-app.js";
