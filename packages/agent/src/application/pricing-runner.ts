import { z } from "zod";
import type { Target } from "../domain/targets.js";
import { buildMonitoringGraph, type MonitoringGraph } from "../graph/monitoring-graph.js";
import { buildPricingGraph, type PricingGraph } from "../graph/pricing-graph.js";
import type { GraphDescription } from "../graph/state-graph.js";
import { errorMessage } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { monitoringStages, pricingStages, type DecisionLedger, type StageContext, type StageSettings } from "../stages/index.js";
import type { LlmClient } from "../types/llm-client.js";
import { ActivePromotionSchema, createPipelineState, type ExecutionResult, type MonitoringState } from "../types/state.js";
import type { ToolInvoker } from "../types/tool-invoker.js";
import type { FeatureFlagStore } from "./feature-flags.js";
import type { RuntimeTracker } from "./runtime-tracker.js";

const log = logger.createChild("runner");

export interface PricingRunSummary {
  skuId: number;
  storeId: number;
  shouldAct: boolean;
  promotionId: number | null;
  executionStatus: ExecutionResult["status"] | null;
  error: string | null;
  visited: string[];
  finishedAt: string;
}

export interface MonitoringSummary {
  checked: number;
  retracted: number;
  failed: number;
  /** Rows that did not look like a promotion. */
  skipped: number;
}

/** The work the scheduler drives; PricingRunner is the real one. */
export interface PricingWork {
  analyzeTarget(target: Target): Promise<PricingRunSummary>;
  monitorActivePromotions(): Promise<MonitoringSummary>;
}

export interface PricingRunnerDeps {
  settings: StageSettings;
  tools: ToolInvoker;
  llm: LlmClient;
  ledger: DecisionLedger;
  tracker: RuntimeTracker;
  flags: FeatureFlagStore;
  now?: () => Date;
}

/** Runs the compiled graphs against the live adapters, one run at a time. */
export class PricingRunner implements PricingWork {
  private readonly deps: PricingRunnerDeps;
  private readonly now: () => Date;
  private readonly pricingGraph: PricingGraph<StageContext>;
  private readonly monitoringGraph: MonitoringGraph<StageContext>;

  constructor(deps: PricingRunnerDeps) {
    this.deps = deps;
    this.now = deps.now ?? (() => new Date());
    this.pricingGraph = buildPricingGraph(pricingStages);
    this.monitoringGraph = buildMonitoringGraph(monitoringStages);
  }

  describeGraphs(): { pricing: GraphDescription; monitoring: GraphDescription } {
    return { pricing: this.pricingGraph.describe(), monitoring: this.monitoringGraph.describe() };
  }

  async analyzeTarget(target: Target): Promise<PricingRunSummary> {
    const { tracker } = this.deps;
    const ids = { skuId: target.skuId, storeId: target.storeId };
    log.info({ action: "analyzeTarget", ...ids }, "Pricing run started");

    try {
      const { state, visited } = await this.pricingGraph.run(createPipelineState(ids), this.context(), {
        onNodeEnter: (node) => tracker.enter(node, ids),
      });
      const summary: PricingRunSummary = {
        ...ids,
        shouldAct: state.shouldAct ?? false,
        promotionId: state.promotionId ?? null,
        executionStatus: state.executionResult?.status ?? null,
        error: state.error ?? null,
        visited,
        finishedAt: this.now().toISOString(),
      };
      log.info({ action: "analyzeTarget", ...ids, visited, executionStatus: summary.executionStatus }, "Pricing run finished");
      return summary;
    } finally {
      tracker.clear();
    }
  }

  /** Runs the monitoring graph once per active promotion; one failing promotion does not stop the sweep. */
  async monitorActivePromotions(): Promise<MonitoringSummary> {
    const { tools, tracker } = this.deps;
    const rows = z
      .array(z.unknown())
      .nullish()
      .parse(await tools.invoke("postgres", "get_active_promotions", {})) ?? [];

    const summary: MonitoringSummary = { checked: 0, retracted: 0, failed: 0, skipped: 0 };
    const context = this.context();

    for (const row of rows) {
      const parsed = ActivePromotionSchema.safeParse(row);
      if (!parsed.success) {
        summary.skipped++;
        log.warn({ action: "monitor", issues: parsed.error.issues.length }, "Skipping malformed promotion row");
        continue;
      }
      const promotion = parsed.data;
      const ids = { skuId: promotion.sku_id, storeId: promotion.store_id, promotionId: promotion.id };
      const initial: MonitoringState = {
        promotionId: promotion.id,
        skuId: promotion.sku_id,
        storeId: promotion.store_id,
        promotion,
      };

      try {
        const { state } = await this.monitoringGraph.run(initial, context, {
          onNodeEnter: (node) => tracker.enter(node, ids),
        });
        summary.checked++;
        if (state.retractionResult) summary.retracted++;
        if (state.error) summary.failed++;
      } catch (err) {
        summary.failed++;
        log.error({ action: "monitor", promotionId: promotion.id, err: errorMessage(err) }, "Monitoring run failed");
      } finally {
        tracker.clear();
      }
    }

    log.info({ action: "monitor", ...summary }, "Monitoring sweep finished");
    return summary;
  }

  private context(): StageContext {
    const { settings, tools, llm, ledger, tracker, flags } = this.deps;
    return { flags: flags.snapshot(), settings, tools, llm, ledger, tracker, now: this.now };
  }
}
