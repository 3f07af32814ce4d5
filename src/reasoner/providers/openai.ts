import OpenAI from "openai";
import type { Completion, CompletionRequest, ReasonerClient } from "./types.js";

export type OpenAIClientOptions = {
  apiKey: string;
  model: string;
  temperature: number;
  /** Base URL of an OpenAI-compatible server (Ollama, vLLM, Azure, a proxy). */
  baseURL?: string;
  provider?: string;
  maxTokens?: number;
};

export class OpenAIReasonerClient implements ReasonerClient {
  readonly provider: string;
  readonly model: string;
  private client: OpenAI;

  constructor(private readonly options: OpenAIClientOptions) {
    this.provider = options.provider ?? "openai";
    this.model = options.model;
    // retries and timeouts belong to ReasonerAdapter
    this.client = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseURL, maxRetries: 0 });
  }

  async complete(request: CompletionRequest): Promise<Completion> {
    const response = await this.client.chat.completions.create(
      {
        model: this.model,
        temperature: this.options.temperature,
        max_tokens: this.options.maxTokens ?? 2000,
        messages: [
          { role: "system", content: request.system },
          { role: "user", content: request.user },
        ],
      },
      { signal: request.signal },
    );

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new Error(`${this.provider}/${this.model} returned no content`);
    }
    return { content, tokens: response.usage?.total_tokens ?? 0 };
  }
}
