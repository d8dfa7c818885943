export interface GenerateOptions {
  temperature?: number;
  maxTokens?: number;
}

/**
 * LLMProvider interface – plug in any completion backend.
 * Ships with Claude, OpenAI, a local Ollama server and MockLLM.
 */
export interface LLMProvider {
  readonly name: string;

  /**
   * Generate a text completion given a system prompt and a user message.
   * Returns the raw text response; callers strip markdown fences themselves.
   */
  generate(systemPrompt: string, userMessage: string, options?: GenerateOptions): Promise<string>;
}

export const DEFAULT_TEMPERATURE = 0.7;
export const DEFAULT_MAX_TOKENS = 4000;
