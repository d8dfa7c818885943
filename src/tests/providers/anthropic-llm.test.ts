import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { AnthropicLLM } from "../../providers/anthropic-llm.js";

const fetchMock = vi.fn<(input: string, init?: RequestInit) => Promise<Response>>();

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

describe("AnthropicLLM", () => {
  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("should throw if no API key is provided", () => {
    const original = process.env["ANTHROPIC_API_KEY"];
    delete process.env["ANTHROPIC_API_KEY"];

    expect(() => new AnthropicLLM()).toThrow("ANTHROPIC_API_KEY is required");

    if (original) process.env["ANTHROPIC_API_KEY"] = original;
  });

  it("should name itself after the model", () => {
    expect(new AnthropicLLM({ apiKey: "test-secret" }).name).toBe("Claude/claude-sonnet-4-20250514");
    expect(new AnthropicLLM({ apiKey: "test-secret", model: "claude-test" }).name).toBe("Claude/claude-test");
  });

  it("should post a messages request and join text blocks", async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({
        content: [
          { type: "text", text: "import bpy" },
          { type: "tool_use" },
          { type: "text", text: "bpy.ops.mesh.primitive_cube_add()" },
        ],
        stop_reason: "end_turn",
      }),
    );

    const provider = new AnthropicLLM({ apiKey: "test-secret", baseUrl: "http://llm.test/v1" });
    const result = await provider.generate("You write bpy scripts.", "Create a cube", {
      temperature: 0.3,
      maxTokens: 256,
    });

    expect(result).toBe("import bpy\nbpy.ops.mesh.primitive_cube_add()");
    expect(fetchMock).toHaveBeenCalledOnce();

    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("http://llm.test/v1/messages");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toMatchObject({
      "x-api-key": "test-secret",
      "anthropic-version": "2023-06-01",
    });
    expect(JSON.parse(String(init?.body))).toEqual({
      model: "claude-sonnet-4-20250514",
      max_tokens: 256,
      temperature: 0.3,
      system: "You write bpy scripts.",
      messages: [{ role: "user", content: "Create a cube" }],
    });
  });

  it("should report HTTP failures with status and body", async () => {
    fetchMock.mockResolvedValueOnce(new Response("overloaded", { status: 529 }));

    const provider = new AnthropicLLM({ apiKey: "test-secret" });
    await expect(provider.generate("sys", "msg")).rejects.toThrow(
      "Anthropic request failed with 529: overloaded",
    );
  });

  it("should throw when no text comes back", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ content: [] }));

    const provider = new AnthropicLLM({ apiKey: "test-secret" });
    await expect(provider.generate("sys", "msg")).rejects.toThrow(
      "Anthropic returned an empty response",
    );
  });
});
