import { z } from "zod";
import { errorMessage } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { extractJsonObject, safeJsonParse } from "../lib/safe-json.js";
import { ANALYSIS_SYSTEM_PROMPT, buildAnalysisPrompt } from "../prompts/build-analysis-prompt.js";
import type { AnalysisResult, PipelineState } from "../types/state.js";
import type { StageContext } from "./context.js";

const log = logger.createChild("analyzeMarket");

export const AGENT_NAME = "Market Analysis Agent";

const VerdictSchema = z.object({
  should_act: z.boolean(),
  reasoning: z.string().default(""),
  opportunity_score: z.number().min(0).max(100).nullish(),
  key_factors: z.array(z.string()).default([]),
});

/** Reads the model's JSON verdict; null when the reply is not a usable verdict. */
export function parseVerdict(text: string): Omit<AnalysisResult, "parseFailed"> | null {
  const raw = extractJsonObject(text);
  if (raw === null) return null;
  try {
    const verdict = safeJsonParse(raw, VerdictSchema, { repair: true });
    return {
      shouldAct: verdict.should_act,
      reasoning: verdict.reasoning,
      opportunityScore: verdict.opportunity_score ?? null,
      keyFactors: verdict.key_factors,
    };
  } catch (err) {
    log.debug({ action: "parseVerdict", err: errorMessage(err) }, "Verdict did not parse");
    return null;
  }
}

/**
 * Asks the model whether to act. An unreadable reply means no action, but it is audited
 * as `no_action_unparseable` so it is not mistaken for a considered "no".
 */
export async function analyzeMarket(state: PipelineState, ctx: StageContext): Promise<PipelineState> {
  const { skuId, storeId, inventoryData } = state;

  if (!inventoryData) {
    const analysisResult: AnalysisResult = {
      shouldAct: false,
      reasoning: "No inventory data available; nothing to analyze.",
      opportunityScore: null,
      keyFactors: [],
      parseFailed: false,
    };
    await ctx.ledger.recordDecision({
      agentName: AGENT_NAME,
      skuId,
      storeId,
      decisionType: "market_analysis",
      reasoning: analysisResult.reasoning,
      dataUsed: {},
      outcome: "no_action",
    });
    return { ...state, analysisResult, shouldAct: false };
  }

  const competitors = state.competitorData ?? [];
  const prompt = buildAnalysisPrompt({
    inventory: inventoryData,
    sellThrough: state.sellThroughRate,
    weather: state.weatherData,
    competitors,
    social: state.socialData,
  });

  let text: string;
  try {
    const completion = await ctx.llm.complete(ANALYSIS_SYSTEM_PROMPT, prompt);
    text = completion.text;
    await ctx.ledger.recordTokenUsage({
      agentName: AGENT_NAME,
      operation: "analyze_market_conditions",
      completion,
      skuId,
      context: { store_id: storeId },
    });
  } catch (err) {
    log.warn({ action: "analyzeMarket", skuId, storeId, err: errorMessage(err) }, "Market analysis call failed");
    return { ...state, error: errorMessage(err), shouldAct: false };
  }

  const verdict = parseVerdict(text);
  const analysisResult: AnalysisResult = verdict
    ? { ...verdict, parseFailed: false }
    : { shouldAct: false, reasoning: text, opportunityScore: null, keyFactors: [], parseFailed: true };
  const outcome = analysisResult.parseFailed ? "no_action_unparseable" : analysisResult.shouldAct ? "act" : "no_action";

  await ctx.ledger.recordDecision({
    agentName: AGENT_NAME,
    skuId,
    storeId,
    decisionType: "market_analysis",
    promptFed: prompt,
    reasoning: analysisResult.reasoning,
    dataUsed: {
      inventoryStatus: inventoryData.stock_status ?? null,
      temperature: state.weatherData?.temperature_celsius ?? null,
      competitorCount: competitors.length,
    },
    outcome,
  });

  log.info({ action: "analyzeMarket", skuId, storeId, outcome, opportunityScore: analysisResult.opportunityScore }, "Market analyzed");
  return { ...state, analysisResult, shouldAct: analysisResult.shouldAct };
}
