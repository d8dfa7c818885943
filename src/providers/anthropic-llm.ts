import { z } from "zod";
import {
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
  type GenerateOptions,
  type LLMProvider,
} from "./llm-provider.js";

const ANTHROPIC_BASE = "https://api.anthropic.com/v1";
const ANTHROPIC_VERSION = "2023-06-01";

const MessageResponseSchema = z.object({
  content: z.array(
    z.object({
      type: z.string(),
      text: z.string().optional(),
    }),
  ),
  stop_reason: z.string().nullable().optional(),
});

/**
 * Claude provider – calls the Anthropic Messages API over fetch.
 *
 * Reads ANTHROPIC_API_KEY from environment unless a key is passed in.
 */
export class AnthropicLLM implements LLMProvider {
  readonly name: string;
  private readonly apiKey: string;
  private readonly model: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(options?: { apiKey?: string; model?: string; baseUrl?: string; timeoutMs?: number }) {
    const apiKey = options?.apiKey ?? process.env["ANTHROPIC_API_KEY"];
    if (!apiKey) {
      throw new Error(
        "ANTHROPIC_API_KEY is required. Set it in .env or pass via constructor."
      );
    }

    this.apiKey = apiKey;
    this.model = options?.model ?? "claude-sonnet-4-20250514";
    this.baseUrl = options?.baseUrl ?? ANTHROPIC_BASE;
    this.timeoutMs = options?.timeoutMs ?? 120_000;
    this.name = `Claude/${this.model}`;
  }

  async generate(
    systemPrompt: string,
    userMessage: string,
    options?: GenerateOptions,
  ): Promise<string> {
    const response = await fetch(`${this.baseUrl}/messages`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        "x-api-key": this.apiKey,
        "anthropic-version": ANTHROPIC_VERSION,
      },
      body: JSON.stringify({
        model: this.model,
        max_tokens: options?.maxTokens ?? DEFAULT_MAX_TOKENS,
        temperature: options?.temperature ?? DEFAULT_TEMPERATURE,
        system: systemPrompt,
        messages: [{ role: "user", content: userMessage }],
      }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      const body = await response.text();
      throw new Error(`Anthropic request failed with ${response.status}: ${body || response.statusText}`);
    }

    const message = MessageResponseSchema.parse(await response.json());
    const text = message.content
      .flatMap((block) => (block.type === "text" && block.text ? [block.text] : []))
      .join("\n")
      .trim();

    if (!text) {
      throw new Error("Anthropic returned an empty response");
    }

    return text;
  }
}
