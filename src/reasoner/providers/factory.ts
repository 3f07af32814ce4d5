import type { LlmConfig } from "../../types/config.js";
import { silentLogger, type Logger } from "../../core/logger.js";
import { AnthropicReasonerClient } from "./anthropic.js";
import { OpenAIReasonerClient } from "./openai.js";
import type { ReasonerClient } from "./types.js";

/**
 * Build the configured client, or `null` when reasoning is disabled or cannot
 * be used. Hosted providers need their API key variable set; the
 * OpenAI-compatible provider needs an endpoint and treats the key as optional.
 */
export function createReasonerClient(
  config: LlmConfig,
  env: Record<string, string | undefined> = process.env,
  logger: Logger = silentLogger,
): ReasonerClient | null {
  if (!config.enabled) return null;

  const apiKey = env[config.api_key_env] ?? "";
  const endpoint = config.endpoint?.trim() ?? "";

  switch (config.provider) {
    case "openai":
    case "anthropic": {
      if (!apiKey) {
        logger.warn(`reasoner disabled: ${config.api_key_env} is empty`, { provider: config.provider });
        return null;
      }
      const baseURL = endpoint || undefined;
      return config.provider === "openai"
        ? new OpenAIReasonerClient({ apiKey, model: config.model, temperature: config.temperature, baseURL })
        : new AnthropicReasonerClient({ apiKey, model: config.model, temperature: config.temperature, baseURL });
    }
    case "openai-compatible": {
      if (!endpoint) {
        logger.warn("reasoner disabled: openai-compatible provider requires llm.endpoint", {
          provider: config.provider,
        });
        return null;
      }
      return new OpenAIReasonerClient({
        // local servers accept any key; the SDK refuses an empty one
        apiKey: apiKey || "unused",
        model: config.model,
        temperature: config.temperature,
        baseURL: endpoint,
        provider: "openai-compatible",
      });
    }
  }
}
