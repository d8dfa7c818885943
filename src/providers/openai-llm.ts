import OpenAI from "openai";
import {
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
  type GenerateOptions,
  type LLMProvider,
} from "./llm-provider.js";

/**
 * OpenAI LLM provider – chat completions against GPT-4o (or any OpenAI model).
 *
 * Reads OPENAI_API_KEY from environment unless a key is passed in.
 */
export class OpenAILLM implements LLMProvider {
  readonly name: string;
  private client: OpenAI;
  private model: string;

  constructor(options?: { apiKey?: string; model?: string }) {
    const apiKey = options?.apiKey ?? process.env["OPENAI_API_KEY"];
    if (!apiKey) {
      throw new Error(
        "OPENAI_API_KEY is required. Set it in .env or pass via constructor."
      );
    }

    this.model = options?.model ?? "gpt-4o";
    this.name = `OpenAI/${this.model}`;
    this.client = new OpenAI({ apiKey });
  }

  async generate(
    systemPrompt: string,
    userMessage: string,
    options?: GenerateOptions,
  ): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      messages: [
        { role: "system", content: systemPrompt },
        { role: "user", content: userMessage },
      ],
      temperature: options?.temperature ?? DEFAULT_TEMPERATURE,
      max_tokens: options?.maxTokens ?? DEFAULT_MAX_TOKENS,
    });

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new Error("OpenAI returned an empty response");
    }

    return content;
  }
}
