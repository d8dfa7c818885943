import { z } from "zod";
import {
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
  type GenerateOptions,
  type LLMProvider,
} from "./llm-provider.js";

const GenerateResponseSchema = z.object({
  response: z.string(),
});

/**
 * Local provider – a single non-streaming call to an Ollama-compatible
 * /api/generate endpoint. The system prompt is folded into the prompt text.
 */
export class OllamaLLM implements LLMProvider {
  readonly name: string;
  private readonly url: string;
  private readonly model: string;

  constructor(options?: { url?: string; model?: string }) {
    this.url = options?.url ?? "http://localhost:11434/api/generate";
    this.model = options?.model ?? "codellama";
    this.name = `Local/${this.model}`;
  }

  async generate(
    systemPrompt: string,
    userMessage: string,
    options?: GenerateOptions,
  ): Promise<string> {
    const prompt = `${systemPrompt}\n\nUser request: ${userMessage}\n\nGenerate the Python code:`;

    const response = await fetch(this.url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        model: this.model,
        prompt,
        stream: false,
        options: {
          temperature: options?.temperature ?? DEFAULT_TEMPERATURE,
          num_predict: options?.maxTokens ?? DEFAULT_MAX_TOKENS,
        },
      }),
    });

    if (!response.ok) {
      throw new Error(`Local LLM request failed with ${response.status}: ${response.statusText}`);
    }

    const { response: text } = GenerateResponseSchema.parse(await response.json());
    return text;
  }
}
