import Fastify, { type FastifyInstance } from "fastify";
import { loadConfig } from "../core/config/index.js";
import { BlenderExecutor } from "../core/execution/blenderExecutor.js";
import { getLogLevel, setLogLevel } from "../core/logger.js";
import { Orchestrator, type RunOptions } from "../core/pipeline/orchestrator.js";
import { createLLMProvider } from "../providers/index.js";

export interface ServerDeps {
  orchestrator: Orchestrator;
  providerName: string;
  /** Level for Fastify's request logger; the module loggers' level when omitted. */
  logLevel?: string;
}

/** Wire the pipeline from environment configuration. */
export function createDefaultDeps(): ServerDeps {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  const llm = createLLMProvider(config);
  const executor = new BlenderExecutor({
    blenderPath: config.blenderPath,
    paths: config.paths,
    render: config.render,
    exportFormat: config.exportFormat,
    defaultMode: config.defaultMode,
    autoRender: config.autoRender,
    autoExport: config.autoExport,
    autoSave: config.autoSave,
    timeoutMs: config.executionTimeoutMs,
  });
  return {
    orchestrator: new Orchestrator({ llm, settings: config, executor }),
    providerName: llm.name,
    logLevel: config.logLevel,
  };
}

const codeBody = {
  type: "object",
  required: ["code"],
  properties: {
    code: { type: "string" },
  },
} as const;

export function buildServer(deps: ServerDeps = createDefaultDeps()): FastifyInstance {
  const fastify = Fastify({ logger: { level: deps.logLevel ?? getLogLevel() } });
  const { orchestrator, providerName } = deps;
  const processor = orchestrator.getProcessor();
  const validator = orchestrator.getValidator();

  fastify.addHook("onReady", async () => {
    await orchestrator.initialize();
  });

  // ── Health check ──────────────────────────────────────────────────
  fastify.get("/health", async () => {
    return { status: "ok", provider: providerName, timestamp: new Date().toISOString() };
  });

  // ── POST /prompts/analyze ─────────────────────────────────────────
  fastify.post<{ Body: { prompt: string } }>("/prompts/analyze", {
    schema: {
      body: {
        type: "object",
        required: ["prompt"],
        properties: {
          prompt: { type: "string", minLength: 1 },
        },
      },
    },
    handler: async (req, reply) => {
      const processed = processor.process(req.body.prompt);
      const suggestions = processor.suggestImprovements(req.body.prompt);
      return reply.code(200).send({ ...processed, suggestions });
    },
  });

  // ── POST /code/validate ───────────────────────────────────────────
  fastify.post<{ Body: { code: string } }>("/code/validate", {
    schema: { body: codeBody },
    handler: async (req, reply) => {
      const report = validator.validate(req.body.code);
      const suggestions = validator.getSuggestions(req.body.code);
      return reply.code(200).send({ ...report, suggestions });
    },
  });

  // ── POST /code/fix ────────────────────────────────────────────────
  fastify.post<{ Body: { code: string } }>("/code/fix", {
    schema: { body: codeBody },
    handler: async (req, reply) => {
      const code = validator.autoFix(req.body.code);
      return reply.code(200).send({ code, report: validator.validate(code) });
    },
  });

  // ── POST /generate ────────────────────────────────────────────────
  fastify.post<{ Body: { prompt: string; options?: RunOptions } }>("/generate", {
    schema: {
      body: {
        type: "object",
        required: ["prompt"],
        properties: {
          prompt: { type: "string", minLength: 1 },
          options: {
            type: "object",
            additionalProperties: false,
            properties: {
              mode: { type: "string", enum: ["background", "gui"] },
              render: { type: "boolean" },
              export: { type: "boolean" },
              save: { type: "boolean" },
              validate: { type: "boolean" },
              maxRetries: { type: "integer", minimum: 1 },
              dryRun: { type: "boolean" },
            },
          },
        },
      },
    },
    handler: async (req, reply) => {
      try {
        const artifact = await orchestrator.run(req.body.prompt, req.body.options ?? {});
        return reply.code(200).send(artifact);
      } catch (error) {
        const message = error instanceof Error ? error.message : "Unknown error";
        return reply.code(500).send({ error: message });
      }
    },
  });

  // ── GET /runs/:id ─────────────────────────────────────────────────
  fastify.get<{ Params: { id: string } }>("/runs/:id", async (req, reply) => {
    const artifact = await orchestrator.getStore().loadRunArtifact(req.params.id);
    if (!artifact) {
      return reply.code(404).send({ error: `Run ${req.params.id} not found` });
    }
    return reply.code(200).send(artifact);
  });

  return fastify;
}
