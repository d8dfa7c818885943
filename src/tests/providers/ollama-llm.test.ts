import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { OllamaLLM } from "../../providers/ollama-llm.js";

const fetchMock = vi.fn<(input: string, init?: RequestInit) => Promise<Response>>();

describe("OllamaLLM", () => {
  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("should default to codellama on localhost", () => {
    expect(new OllamaLLM().name).toBe("Local/codellama");
  });

  it("should fold the system prompt into a single non-streaming request", async () => {
    fetchMock.mockResolvedValueOnce(new Response(JSON.stringify({ response: "import bpy" })));

    const provider = new OllamaLLM({ url: "http://ollama.test/api/generate", model: "llama3" });
    const result = await provider.generate("SYSTEM", "a red cube", { temperature: 0.1, maxTokens: 99 });

    expect(result).toBe("import bpy");
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("http://ollama.test/api/generate");
    expect(JSON.parse(String(init?.body))).toEqual({
      model: "llama3",
      prompt: "SYSTEM\n\nUser request: a red cube\n\nGenerate the Python code:",
      stream: false,
      options: { temperature: 0.1, num_predict: 99 },
    });
  });

  it("should throw on a non-OK status", async () => {
    fetchMock.mockResolvedValueOnce(new Response("", { status: 500, statusText: "Internal Server Error" }));

    const provider = new OllamaLLM();
    await expect(provider.generate("sys", "msg")).rejects.toThrow(
      "Local LLM request failed with 500: Internal Server Error",
    );
  });

  it("should reject a body without a response field", async () => {
    fetchMock.mockResolvedValueOnce(new Response(JSON.stringify({ done: true })));

    const provider = new OllamaLLM();
    await expect(provider.generate("sys", "msg")).rejects.toThrow();
  });
});
