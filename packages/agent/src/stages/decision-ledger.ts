import { computeTokenCost, type TokenRates } from "../domain/token-cost.js";
import { errorMessage } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import type { LlmCompletion } from "../types/llm-client.js";
import type { CriticEvaluation, OptimizationIteration, PerformanceData, Recommendation } from "../types/state.js";
import type { ToolInvoker } from "../types/tool-invoker.js";

const log = logger.createChild("ledger");

const REASONING_LIMIT = 500;

export interface DecisionRecord {
  agentName: string;
  skuId: number;
  storeId: number;
  decisionType: string;
  reasoning: string;
  dataUsed: Record<string, unknown>;
  outcome: string;
  promptFed?: string | null;
  promotionId?: number | null;
}

export interface TokenUsageRecord {
  agentName: string;
  operation: string;
  completion: LlmCompletion;
  skuId: number;
  promotionId?: number | null;
  context?: Record<string, unknown>;
}

/**
 * Audit trail writes. Every method resolves to false instead of throwing, so a failed
 * audit write never aborts the stage that made the decision.
 */
export class DecisionLedger {
  private readonly tools: ToolInvoker;
  private readonly rates: TokenRates;

  constructor(tools: ToolInvoker, rates: TokenRates) {
    this.tools = tools;
    this.rates = rates;
  }

  recordDecision(record: DecisionRecord): Promise<boolean> {
    return this.write("log_agent_decision", {
      agent_name: record.agentName,
      sku_id: record.skuId,
      store_id: record.storeId,
      decision_type: record.decisionType,
      prompt_fed: record.promptFed ?? null,
      reasoning: record.reasoning.slice(0, REASONING_LIMIT),
      data_used: record.dataUsed,
      decision_outcome: record.outcome,
      ...(record.promotionId != null ? { promotion_id: record.promotionId } : {}),
    });
  }

  recordTokenUsage(record: TokenUsageRecord): Promise<boolean> {
    const { promptTokens, completionTokens, model } = record.completion;
    return this.write("log_token_usage", {
      agent_name: record.agentName,
      operation: record.operation,
      model,
      prompt_tokens: promptTokens,
      completion_tokens: completionTokens,
      total_tokens: promptTokens + completionTokens,
      estimated_cost: computeTokenCost(promptTokens, completionTokens, this.rates),
      sku_id: record.skuId,
      promotion_id: record.promotionId ?? null,
      context: record.context ?? {},
    });
  }

  recordOptimizationIteration(skuId: number, storeId: number, iteration: OptimizationIteration): Promise<boolean> {
    return this.write("log_optimization_iteration", {
      sku_id: skuId,
      store_id: storeId,
      iteration_index: iteration.index,
      objective_name: iteration.objectiveName,
      objective_score: iteration.objectiveScore,
      candidate_offer: iteration.candidateOffer,
      constraints_checked: iteration.constraintsSatisfied,
      is_selected: iteration.isSelected,
    });
  }

  recordEvaluatorScore(
    skuId: number,
    storeId: number,
    evaluation: CriticEvaluation,
    arbitrationDecision: Recommendation,
  ): Promise<boolean> {
    return this.write("log_evaluator_score", {
      sku_id: skuId,
      store_id: storeId,
      evaluator_name: evaluation.evaluatorName,
      score: evaluation.score,
      rationale: evaluation.rationale,
      risk_flags: { flags: evaluation.riskFlags },
      recommendation: evaluation.recommendation,
      arbitration_decision: arbitrationDecision,
    });
  }

  recordPerformanceMetric(promotionId: number, performance: PerformanceData): Promise<boolean> {
    return this.write("log_performance_metric", {
      promotion_id: promotionId,
      units_sold_so_far: performance.unitsSoldSoFar,
      revenue_so_far: performance.revenueSoFar,
      performance_ratio: performance.performanceRatio,
      is_profitable: performance.isProfitable,
      margin_maintained: performance.marginMaintained,
      notes: performance.retractReason ?? `Monitoring check: ${performance.rating}`,
    });
  }

  private async write(operation: string, parameters: Record<string, unknown>): Promise<boolean> {
    try {
      await this.tools.invoke("postgres", operation, parameters);
      return true;
    } catch (err) {
      log.warn({ action: operation, err: errorMessage(err) }, "Audit write failed");
      return false;
    }
  }
}
