import Anthropic from "@anthropic-ai/sdk";
import type { Completion, CompletionRequest, ReasonerClient } from "./types.js";

export type AnthropicClientOptions = {
  apiKey: string;
  model: string;
  temperature: number;
  baseURL?: string;
  maxTokens?: number;
};

export class AnthropicReasonerClient implements ReasonerClient {
  readonly provider = "anthropic";
  readonly model: string;
  private client: Anthropic;

  constructor(private readonly options: AnthropicClientOptions) {
    this.model = options.model;
    this.client = new Anthropic({ apiKey: options.apiKey, baseURL: options.baseURL, maxRetries: 0 });
  }

  async complete(request: CompletionRequest): Promise<Completion> {
    const response = await this.client.messages.create(
      {
        model: this.model,
        max_tokens: this.options.maxTokens ?? 2000,
        temperature: this.options.temperature,
        system: request.system,
        messages: [{ role: "user", content: request.user }],
      },
      { signal: request.signal },
    );

    const textBlock = response.content.find((block) => block.type === "text");
    if (!textBlock || textBlock.type !== "text") {
      throw new Error(`anthropic/${this.model} returned no text content`);
    }
    return {
      content: textBlock.text,
      tokens: (response.usage?.input_tokens ?? 0) + (response.usage?.output_tokens ?? 0),
    };
  }
}
