export interface LlmCompletion {
  text: string;
  promptTokens: number;
  completionTokens: number;
  model: string;
}

export interface LlmClient {
  complete(systemPrompt: string, userPrompt: string): Promise<LlmCompletion>;
}
