import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";
import type { FastifyInstance } from "fastify";
import { buildServer } from "../server/app.js";
import { Orchestrator } from "../core/pipeline/orchestrator.js";
import { RunArtifactSchema } from "../core/schemas/index.js";
import { MockLLM } from "../providers/mock-llm.js";
import { createSettings } from "./helpers/fixtures.js";

describe("HTTP API", () => {
  let tempDir: string;
  let server: FastifyInstance;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "scene-server-test-"));
    const llm = new MockLLM();
    const orchestrator = new Orchestrator({ llm, settings: createSettings(tempDir) });
    server = buildServer({ orchestrator, providerName: llm.name });
    await server.ready();
  });

  afterEach(async () => {
    await server.close();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("should report health", async () => {
    const res = await server.inject({ method: "GET", url: "/health" });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ status: "ok", provider: "MockLLM" });
  });

  it("should analyze a prompt", async () => {
    const res = await server.inject({
      method: "POST",
      url: "/prompts/analyze",
      payload: { prompt: "Create a red cube" },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({
      cleaned: "Create a red cube",
      category: "modeling",
      complexity: "simple",
      promptType: "modeling",
      suggestions: ["Add more details about size, color, or placement"],
    });
  });

  it("should reject an empty prompt", async () => {
    const res = await server.inject({ method: "POST", url: "/prompts/analyze", payload: { prompt: "" } });
    expect(res.statusCode).toBe(400);
  });

  it("should validate code", async () => {
    const res = await server.inject({
      method: "POST",
      url: "/code/validate",
      payload: { code: 'import bpy\nimport os\nos.system("ls")' },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({
      isValid: false,
      errors: ["Dangerous operation detected: os.system"],
    });
  });

  it("should auto-fix code and report on the result", async () => {
    const res = await server.inject({
      method: "POST",
      url: "/code/fix",
      payload: { code: "bpy.ops.mesh.primitive_cube_add()" },
    });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.code.startsWith("import bpy\n# Clear existing objects\n")).toBe(true);
    expect(body.report).toEqual({
      isValid: true,
      errors: [],
      warnings: ["Objects created but not named - may be hard to reference"],
    });
  });

  it("should run the pipeline and serve the stored run", async () => {
    const generated = await server.inject({
      method: "POST",
      url: "/generate",
      payload: { prompt: "Create a red cube", options: { dryRun: true } },
    });

    expect(generated.statusCode).toBe(200);
    const artifact = RunArtifactSchema.parse(generated.json());
    expect(artifact.success).toBe(true);

    const fetched = await server.inject({ method: "GET", url: `/runs/${artifact.runId}` });
    expect(fetched.statusCode).toBe(200);
    expect(fetched.json()).toEqual(artifact);
  });

  it("should return 404 for an unknown run", async () => {
    const res = await server.inject({ method: "GET", url: "/runs/00000000-0000-4000-8000-000000000000" });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: "Run 00000000-0000-4000-8000-000000000000 not found" });
  });
});
