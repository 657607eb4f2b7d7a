/**
 * Shared test factories.
 */
import { vi } from "vitest";
import { RuntimeTracker } from "./application/runtime-tracker.js";
import { DecisionLedger } from "./stages/decision-ledger.js";
import { stageSettings, type StageContext } from "./stages/context.js";
import { AgentConfigSchema, type AgentConfig, type FeatureFlags } from "./types/config.js";
import type { LlmClient, LlmCompletion } from "./types/llm-client.js";
import type { PromotionDesign } from "./types/state.js";
import type { ToolInvoker } from "./types/tool-invoker.js";

export const TEST_NOW = new Date("2026-04-01T12:00:00.000Z");

export type ToolHandler = (parameters: Record<string, unknown>) => unknown;

/**
 * Tool invoker answering by operation name; a handler that throws makes the call fail.
 * Unlisted operations resolve to `{ logged: true }`, which is what every audit write needs.
 */
export function createMockTools(handlers: Record<string, ToolHandler> = {}) {
  const invoke = vi.fn<ToolInvoker["invoke"]>(async (_service, operation, parameters) => {
    const handler = handlers[operation];
    return handler ? handler(parameters) : { logged: true };
  });
  const close = vi.fn<ToolInvoker["close"]>(async () => {});
  return { invoke, close } satisfies ToolInvoker;
}

/** Calls made to one operation, as parameter objects in call order. */
export function callsTo(tools: ReturnType<typeof createMockTools>, operation: string): Array<Record<string, unknown>> {
  return tools.invoke.mock.calls.filter(([, op]) => op === operation).map(([, , params]) => params);
}

export function createMockLlm(text = '{"should_act": true, "reasoning": "ok", "opportunity_score": 70, "key_factors": []}') {
  const completion: LlmCompletion = { text, promptTokens: 100, completionTokens: 20, model: "test-model" };
  const complete = vi.fn<LlmClient["complete"]>(async () => completion);
  return { complete } satisfies LlmClient;
}

export function createTestConfig(overrides: Record<string, unknown> = {}): AgentConfig {
  return AgentConfigSchema.parse({ targets: { skus: [1, 2, 3], stores: [1] }, ...overrides });
}

export interface StageContextOptions {
  tools?: ToolInvoker;
  llm?: LlmClient;
  flags?: Partial<FeatureFlags>;
  config?: AgentConfig;
  now?: Date;
}

export function createStageContext(options: StageContextOptions = {}): StageContext {
  const config = options.config ?? createTestConfig();
  const tools = options.tools ?? createMockTools();
  const now = options.now ?? TEST_NOW;
  return {
    flags: { ...config.featureFlags, ...options.flags },
    settings: stageSettings(config),
    tools,
    llm: options.llm ?? createMockLlm(),
    ledger: new DecisionLedger(tools, config.llm),
    tracker: new RuntimeTracker(() => now),
    now: () => now,
  };
}

export function makeDesign(overrides: Partial<PromotionDesign> = {}): PromotionDesign {
  return {
    promotionType: "discount",
    discountType: "percentage",
    discountValue: 10,
    originalPrice: 10,
    promotionalPrice: 9,
    marginPercent: 40,
    validFrom: "2026-04-01T12:00:00.000Z",
    validUntil: "2026-04-02T12:00:00.000Z",
    targetRadiusKm: 5,
    expectedUnitsSold: 16,
    expectedRevenue: 144,
    reason: "DISCOUNT: test proposal",
    ...overrides,
  };
}
