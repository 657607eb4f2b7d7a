import { z } from "zod";
import {
  ApprovalFeedbackSchema,
  FEEDBACK_LIMIT,
  FEEDBACK_WINDOW_DAYS,
  HISTORY_CASE_LIMIT,
  HistoricalCaseSchema,
  PRIOR_MAX_AGE_HOURS,
  derivePriors,
  type ApprovalFeedback,
  type HistoricalCase,
} from "../domain/decision-priors.js";
import { errorMessage } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { LearnedPriorsSchema, type DecisionPriors, type PipelineState } from "../types/state.js";
import type { StageContext } from "./context.js";

const log = logger.createChild("decisionPriors");

export const AGENT_NAME = "Decision Learning Agent";

const CachedPriorSchema = z
  .object({
    id: z.coerce.number().int().nullish(),
    prior_payload: z.unknown(),
  })
  .passthrough();

const CreatedRowSchema = z.object({ id: z.coerce.number().int().nullish() }).passthrough().nullish();

async function fetchCached(state: PipelineState, ctx: StageContext): Promise<DecisionPriors | null> {
  try {
    const row = CachedPriorSchema.nullish().parse(
      await ctx.tools.invoke("postgres", "get_latest_decision_prior", {
        sku_id: state.skuId,
        store_id: state.storeId,
        max_age_hours: PRIOR_MAX_AGE_HOURS,
      }),
    );
    if (!row) return null;
    const priors = LearnedPriorsSchema.safeParse(row.prior_payload);
    if (!priors.success) {
      log.debug({ action: "fetchCached", skuId: state.skuId, storeId: state.storeId }, "Cached prior payload unreadable, regenerating");
      return null;
    }
    return { status: "loaded", source: "cache", priorId: row.id ?? null, priors: priors.data };
  } catch (err) {
    log.warn({ action: "fetchCached", skuId: state.skuId, err: errorMessage(err) }, "Could not fetch cached priors");
    return null;
  }
}

async function fetchCases(state: PipelineState, ctx: StageContext): Promise<HistoricalCase[]> {
  try {
    const rows = await ctx.tools.invoke("postgres", "get_historical_promotion_cases", {
      sku_id: state.skuId,
      store_id: state.storeId,
      limit: HISTORY_CASE_LIMIT,
    });
    return z.array(HistoricalCaseSchema).nullish().parse(rows) ?? [];
  } catch (err) {
    log.warn({ action: "fetchCases", skuId: state.skuId, err: errorMessage(err) }, "Historical case fetch failed");
    return [];
  }
}

async function fetchFeedback(state: PipelineState, ctx: StageContext): Promise<ApprovalFeedback[]> {
  if (!ctx.flags.enableApprovalLearning) return [];
  try {
    const rows = await ctx.tools.invoke("postgres", "get_approval_feedback", {
      sku_id: state.skuId,
      store_id: state.storeId,
      days: FEEDBACK_WINDOW_DAYS,
      limit: FEEDBACK_LIMIT,
    });
    return z.array(ApprovalFeedbackSchema).nullish().parse(rows) ?? [];
  } catch (err) {
    log.warn({ action: "fetchFeedback", skuId: state.skuId, err: errorMessage(err) }, "Approval feedback fetch failed");
    return [];
  }
}

async function generate(state: PipelineState, ctx: StageContext): Promise<DecisionPriors> {
  const cases = await fetchCases(state, ctx);
  const feedback = await fetchFeedback(state, ctx);
  const priors = derivePriors(cases, feedback, ctx.settings.agent, ctx.now());
  if (!priors) return { status: "unavailable" };

  let priorId: number | null = null;
  try {
    const created = CreatedRowSchema.parse(
      await ctx.tools.invoke("postgres", "create_decision_prior", {
        sku_id: state.skuId,
        store_id: state.storeId,
        success_probability: priors.successProbability,
        confidence_score: priors.confidence,
        expected_roi_band: priors.expectedRoiBand,
        risk_flags: { flags: priors.riskFlags },
        prior_payload: priors,
        generated_by: "decision_learning_stage",
      }),
    );
    priorId = created?.id ?? null;
  } catch (err) {
    log.warn({ action: "persistPriors", skuId: state.skuId, err: errorMessage(err) }, "Failed to persist priors");
  }
  return { status: "loaded", source: "generated", priorId, priors };
}

/**
 * Attaches behavioural priors: a cached prior when a fresh one exists, otherwise one
 * derived from past promotion outcomes. Disabled learning yields `{ status: "disabled" }`.
 */
export async function loadDecisionPriors(state: PipelineState, ctx: StageContext): Promise<PipelineState> {
  if (!ctx.flags.enableDecisionLearning) {
    return { ...state, decisionPriors: { status: "disabled" } };
  }

  const decisionPriors = (await fetchCached(state, ctx)) ?? (await generate(state, ctx));
  const loaded = decisionPriors.status === "loaded";

  await ctx.ledger.recordDecision({
    agentName: AGENT_NAME,
    skuId: state.skuId,
    storeId: state.storeId,
    decisionType: "decision_priors",
    reasoning: loaded
      ? "Loaded decision priors from behavioral memory."
      : "No priors available; fallback to baseline strategy.",
    dataUsed: {
      priorsAvailable: loaded,
      priorSource: loaded ? decisionPriors.source : "none",
      riskFlags: loaded ? decisionPriors.priors.riskFlags : [],
    },
    outcome: loaded ? "priors_loaded" : "fallback_no_priors",
  });

  log.info({ action: "loadDecisionPriors", skuId: state.skuId, storeId: state.storeId, status: decisionPriors.status }, "Decision priors resolved");
  return { ...state, decisionPriors };
}
