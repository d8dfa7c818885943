import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { z, ZodError } from "zod";
import { ExecutionModeSchema, ExportFormatSchema } from "../schemas/index.js";

/** Repository root: three levels above this module in both src/ and dist/. */
export const PROJECT_ROOT = fileURLToPath(new URL("../../../", import.meta.url));

/** System prompt templates shipped with the project. */
export const BUNDLED_PROMPTS_DIR = path.join(PROJECT_ROOT, "prompts");

export const ProviderNameSchema = z.enum(["claude", "openai", "local", "mock"]);
export type ProviderName = z.infer<typeof ProviderNameSchema>;

export const RenderEngineSchema = z.enum([
  "CYCLES",
  "BLENDER_EEVEE",
  "BLENDER_EEVEE_NEXT",
  "BLENDER_WORKBENCH",
]);
export type RenderEngine = z.infer<typeof RenderEngineSchema>;

export const LogLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);
export type LogLevel = z.infer<typeof LogLevelSchema>;

const flag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((v) => (v === undefined || v === "" ? fallback : v.trim().toLowerCase() === "true"));

const text = (fallback: string) =>
  z
    .string()
    .optional()
    .transform((v) => (v === undefined || v.trim() === "" ? fallback : v.trim()));

const optionalText = z
  .string()
  .optional()
  .transform((v) => (v === undefined || v.trim() === "" ? undefined : v.trim()));

const lowered = (fallback: string) => text(fallback).transform((v) => v.toLowerCase());

const EnvSchema = z.object({
  AI_PROVIDER: lowered("claude").pipe(ProviderNameSchema),
  ANTHROPIC_API_KEY: optionalText,
  OPENAI_API_KEY: optionalText,
  CLAUDE_MODEL: text("claude-sonnet-4-20250514"),
  OPENAI_MODEL: text("gpt-4o"),
  LOCAL_LLM_URL: text("http://localhost:11434/api/generate").pipe(z.string().url()),
  LOCAL_LLM_MODEL: text("codellama"),

  BLENDER_PATH: text("blender"),
  DEFAULT_MODE: lowered("background").pipe(ExecutionModeSchema),

  AUTO_RENDER: flag(false),
  AUTO_SAVE: flag(true),
  AUTO_EXPORT: flag(false),
  EXPORT_FORMAT: lowered("obj").pipe(ExportFormatSchema),
  RENDER_WIDTH: text("1920").pipe(z.coerce.number().int().positive()),
  RENDER_HEIGHT: text("1080").pipe(z.coerce.number().int().positive()),
  RENDER_SAMPLES: text("128").pipe(z.coerce.number().int().positive()),
  RENDER_ENGINE: text("CYCLES").transform((v) => v.toUpperCase()).pipe(RenderEngineSchema),

  LOG_LEVEL: lowered("info").pipe(LogLevelSchema),

  MAX_TOKENS: text("4000").pipe(z.coerce.number().int().positive()),
  TEMPERATURE: text("0.7").pipe(z.coerce.number().min(0).max(2)),
  VALIDATE_CODE: flag(true),
  SAVE_FAILED_CODE: flag(true),
  ARCHIVE_GENERATIONS: flag(true),
  MAX_RETRIES: text("3").pipe(z.coerce.number().int().min(1)),
  EXECUTION_TIMEOUT_MS: text("300000").pipe(z.coerce.number().int().positive()),

  BASE_DIR: optionalText,
});

export interface OutputPaths {
  baseDir: string;
  promptsDir: string;
  generatedDir: string;
  archiveDir: string;
  outputDir: string;
  rendersDir: string;
  modelsDir: string;
  blendFilesDir: string;
  runsDir: string;
}

export interface RenderSettings {
  width: number;
  height: number;
  samples: number;
  engine: RenderEngine;
}

export interface AppConfig {
  aiProvider: ProviderName;
  anthropicApiKey?: string;
  openaiApiKey?: string;
  claudeModel: string;
  openaiModel: string;
  localLlmUrl: string;
  localLlmModel: string;

  blenderPath: string;
  defaultMode: z.infer<typeof ExecutionModeSchema>;
  autoRender: boolean;
  autoSave: boolean;
  autoExport: boolean;
  exportFormat: z.infer<typeof ExportFormatSchema>;
  render: RenderSettings;

  logLevel: LogLevel;
  maxTokens: number;
  temperature: number;
  validateCode: boolean;
  saveFailedCode: boolean;
  archiveGenerations: boolean;
  maxRetries: number;
  executionTimeoutMs: number;

  paths: OutputPaths;
}

export function resolvePaths(baseDir: string, promptsDir: string = BUNDLED_PROMPTS_DIR): OutputPaths {
  const generatedDir = path.join(baseDir, "generated");
  const outputDir = path.join(baseDir, "output");
  return {
    baseDir,
    promptsDir,
    generatedDir,
    archiveDir: path.join(generatedDir, "archive"),
    outputDir,
    rendersDir: path.join(outputDir, "renders"),
    modelsDir: path.join(outputDir, "models"),
    blendFilesDir: path.join(outputDir, "blend_files"),
    runsDir: path.join(baseDir, "runs"),
  };
}

/**
 * Build the application config from environment variables.
 * Throws one Error listing every problem found.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  let parsed: z.infer<typeof EnvSchema>;
  try {
    parsed = EnvSchema.parse(env);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new Error(formatProblems(error.errors.map((e) => `${e.path.join(".")}: ${e.message}`)));
    }
    throw error;
  }

  const problems: string[] = [];
  if (parsed.AI_PROVIDER === "claude" && !parsed.ANTHROPIC_API_KEY) {
    problems.push("ANTHROPIC_API_KEY is required when AI_PROVIDER=claude");
  }
  if (parsed.AI_PROVIDER === "openai" && !parsed.OPENAI_API_KEY) {
    problems.push("OPENAI_API_KEY is required when AI_PROVIDER=openai");
  }
  if (problems.length > 0) {
    throw new Error(formatProblems(problems));
  }

  return {
    aiProvider: parsed.AI_PROVIDER,
    anthropicApiKey: parsed.ANTHROPIC_API_KEY,
    openaiApiKey: parsed.OPENAI_API_KEY,
    claudeModel: parsed.CLAUDE_MODEL,
    openaiModel: parsed.OPENAI_MODEL,
    localLlmUrl: parsed.LOCAL_LLM_URL,
    localLlmModel: parsed.LOCAL_LLM_MODEL,

    blenderPath: parsed.BLENDER_PATH,
    defaultMode: parsed.DEFAULT_MODE,
    autoRender: parsed.AUTO_RENDER,
    autoSave: parsed.AUTO_SAVE,
    autoExport: parsed.AUTO_EXPORT,
    exportFormat: parsed.EXPORT_FORMAT,
    render: {
      width: parsed.RENDER_WIDTH,
      height: parsed.RENDER_HEIGHT,
      samples: parsed.RENDER_SAMPLES,
      engine: parsed.RENDER_ENGINE,
    },

    logLevel: parsed.LOG_LEVEL,
    maxTokens: parsed.MAX_TOKENS,
    temperature: parsed.TEMPERATURE,
    validateCode: parsed.VALIDATE_CODE,
    saveFailedCode: parsed.SAVE_FAILED_CODE,
    archiveGenerations: parsed.ARCHIVE_GENERATIONS,
    maxRetries: parsed.MAX_RETRIES,
    executionTimeoutMs: parsed.EXECUTION_TIMEOUT_MS,

    paths: resolvePaths(path.resolve(parsed.BASE_DIR ?? PROJECT_ROOT)),
  };
}

function formatProblems(problems: string[]): string {
  return `Configuration validation failed:\n${problems.map((p) => `  - ${p}`).join("\n")}`;
}
