import type { LlmClient, LlmCompletion } from "../types/llm-client.js";

const VERDICT = JSON.stringify({
  should_act: true,
  reasoning: "Dry-run verdict: market data supports a promotion.",
  opportunity_score: 60,
  key_factors: ["dry_run"],
});

const PRICING_NOTE = "Dry-run pricing: undercut the lowest competitor while holding the margin floor.";

/** Canned replies for running without an API key. Analysis prompts get a JSON verdict. */
export class DryRunLlmClient implements LlmClient {
  async complete(_systemPrompt: string, userPrompt: string): Promise<LlmCompletion> {
    const text = userPrompt.includes("should_act") ? VERDICT : PRICING_NOTE;
    return { text, promptTokens: 0, completionTokens: 0, model: "dry-run" };
  }
}
