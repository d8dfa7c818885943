/**
 * Provider factory – builds the LLM backend named by AI_PROVIDER.
 *
 *   claude → AnthropicLLM
 *   openai → OpenAILLM
 *   local  → OllamaLLM
 *   mock   → MockLLM (safe for tests / offline dev)
 *
 * Usage:
 *   import { createLLMProvider } from "../providers/index.js";
 *   const llm = createLLMProvider(config);
 */
export { AnthropicLLM } from "./anthropic-llm.js";
export { MockLLM } from "./mock-llm.js";
export { OllamaLLM } from "./ollama-llm.js";
export { OpenAILLM } from "./openai-llm.js";
export type { GenerateOptions, LLMProvider } from "./llm-provider.js";

import type { AppConfig, ProviderName } from "../core/config/index.js";
import { AnthropicLLM } from "./anthropic-llm.js";
import type { LLMProvider } from "./llm-provider.js";
import { MockLLM } from "./mock-llm.js";
import { OllamaLLM } from "./ollama-llm.js";
import { OpenAILLM } from "./openai-llm.js";

export type ProviderSettings = Pick<
  AppConfig,
  | "aiProvider"
  | "anthropicApiKey"
  | "openaiApiKey"
  | "claudeModel"
  | "openaiModel"
  | "localLlmUrl"
  | "localLlmModel"
>;

export function createLLMProvider(
  settings: ProviderSettings,
  options?: { forceProvider?: ProviderName; model?: string },
): LLMProvider {
  const provider = options?.forceProvider ?? settings.aiProvider;

  switch (provider) {
    case "claude":
      return new AnthropicLLM({
        apiKey: settings.anthropicApiKey,
        model: options?.model ?? settings.claudeModel,
      });
    case "openai":
      return new OpenAILLM({
        apiKey: settings.openaiApiKey,
        model: options?.model ?? settings.openaiModel,
      });
    case "local":
      return new OllamaLLM({
        url: settings.localLlmUrl,
        model: options?.model ?? settings.localLlmModel,
      });
    case "mock":
      return new MockLLM();
  }
}
