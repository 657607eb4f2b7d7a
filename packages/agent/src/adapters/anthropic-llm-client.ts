import Anthropic from "@anthropic-ai/sdk";
import { logger } from "../lib/logger.js";
import type { LlmSettings } from "../types/config.js";
import type { LlmClient, LlmCompletion } from "../types/llm-client.js";

const log = logger.createChild("llm");

export class AnthropicLlmClient implements LlmClient {
  private readonly client: Anthropic;
  private readonly settings: LlmSettings;

  constructor(apiKey: string, settings: LlmSettings) {
    this.client = new Anthropic({ apiKey });
    this.settings = settings;
  }

  async complete(systemPrompt: string, userPrompt: string): Promise<LlmCompletion> {
    const t0 = performance.now();
    const response = await this.client.messages.create({
      model: this.settings.model,
      max_tokens: this.settings.maxTokens,
      system: systemPrompt,
      messages: [{ role: "user", content: userPrompt }],
    });

    const text = response.content
      .map((block) => (block.type === "text" ? block.text : ""))
      .join("");

    log.debug(
      {
        action: "complete",
        model: response.model,
        promptTokens: response.usage.input_tokens,
        completionTokens: response.usage.output_tokens,
        latencyMs: Math.round(performance.now() - t0),
      },
      "LLM completion",
    );

    return {
      text,
      promptTokens: response.usage.input_tokens,
      completionTokens: response.usage.output_tokens,
      model: response.model,
    };
  }
}
