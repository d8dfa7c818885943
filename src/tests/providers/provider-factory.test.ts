import { describe, it, expect, vi } from "vitest";
import {
  AnthropicLLM,
  createLLMProvider,
  MockLLM,
  OllamaLLM,
  OpenAILLM,
  type ProviderSettings,
} from "../../providers/index.js";

// Mock OpenAI SDK so it doesn't need a real key at import time
vi.mock("openai", () => {
  return {
    default: class MockOpenAI {
      chat = { completions: { create: vi.fn() } };
    },
  };
});

const settings: ProviderSettings = {
  aiProvider: "mock",
  anthropicApiKey: "test-secret",
  openaiApiKey: "test-secret",
  claudeModel: "claude-test",
  openaiModel: "gpt-test",
  localLlmUrl: "http://localhost:11434/api/generate",
  localLlmModel: "codellama",
};

describe("createLLMProvider", () => {
  it("should return MockLLM for the mock provider", () => {
    const llm = createLLMProvider(settings);
    expect(llm).toBeInstanceOf(MockLLM);
    expect(llm.name).toBe("MockLLM");
  });

  it("should build the configured claude provider", () => {
    const llm = createLLMProvider({ ...settings, aiProvider: "claude" });
    expect(llm).toBeInstanceOf(AnthropicLLM);
    expect(llm.name).toBe("Claude/claude-test");
  });

  it("should build the configured openai provider", () => {
    const llm = createLLMProvider({ ...settings, aiProvider: "openai" });
    expect(llm).toBeInstanceOf(OpenAILLM);
    expect(llm.name).toBe("OpenAI/gpt-test");
  });

  it("should build the local provider", () => {
    const llm = createLLMProvider({ ...settings, aiProvider: "local" });
    expect(llm).toBeInstanceOf(OllamaLLM);
    expect(llm.name).toBe("Local/codellama");
  });

  it("should let forceProvider override the configured provider", () => {
    const llm = createLLMProvider({ ...settings, aiProvider: "openai" }, { forceProvider: "mock" });
    expect(llm).toBeInstanceOf(MockLLM);
  });

  it("should pass a custom model through", () => {
    const llm = createLLMProvider({ ...settings, aiProvider: "openai" }, { model: "gpt-4o-mini" });
    expect(llm.name).toBe("OpenAI/gpt-4o-mini");
  });
});
