import type { RuntimeTracker } from "../application/runtime-tracker.js";
import type { RoutingContext } from "../graph/routers.js";
import type {
  AgentConfig,
  AgentSettings,
  CriticThresholds,
  PerformanceThresholds,
  PromotionDefaults,
} from "../types/config.js";
import type { LlmClient } from "../types/llm-client.js";
import type { ToolInvoker } from "../types/tool-invoker.js";
import type { DecisionLedger } from "./decision-ledger.js";

export interface StageSettings {
  agent: AgentSettings;
  critic: CriticThresholds;
  promotionDefaults: PromotionDefaults;
  performanceThresholds: PerformanceThresholds;
}

export function stageSettings(config: AgentConfig): StageSettings {
  return {
    agent: config.agent,
    critic: config.critic,
    promotionDefaults: config.promotionDefaults,
    performanceThresholds: config.performanceThresholds,
  };
}

/**
 * Everything a stage may touch besides its state. Built once per graph run, so `flags`
 * is the snapshot the routers see for the whole run.
 */
export interface StageContext extends RoutingContext {
  settings: StageSettings;
  tools: ToolInvoker;
  llm: LlmClient;
  ledger: DecisionLedger;
  tracker: RuntimeTracker;
  now: () => Date;
}
