import { resolvePaths } from "../../core/config/index.js";
import type { OrchestratorSettings } from "../../core/pipeline/orchestrator.js";
import type { ProcessedPrompt, RunArtifact } from "../../core/schemas/index.js";

export const SAMPLE_PROMPT: ProcessedPrompt = {
  original: "Create a red cube",
  cleaned: "Create a red cube",
  enhanced: "Create a red cube Use realistic proportions and scales.",
  category: "modeling",
  complexity: "simple",
  entities: { objects: ["cube"], colors: ["red"], materials: [], quantities: [] },
  measurements: [],
  promptType: "modeling",
};

export function createMockArtifact(runId: string, overrides: Partial<RunArtifact> = {}): RunArtifact {
  const now = new Date().toISOString();
  return {
    runId,
    parentRunId: null,
    request: "Create a red cube",
    prompt: SAMPLE_PROMPT,
    attempts: [{ attempt: 1, report: { isValid: true, errors: [], warnings: [] }, error: null }],
    code: "import bpy",
    scriptPath: "/tmp/generated_20260101_120000.py",
    failedScriptPath: null,
    execution: null,
    success: true,
    error: null,
    startedAt: now,
    completedAt: now,
    ...overrides,
  };
}

export function createSettings(baseDir: string, overrides: Partial<OrchestratorSettings> = {}): OrchestratorSettings {
  return {
    paths: resolvePaths(baseDir),
    temperature: 0.7,
    maxTokens: 4000,
    validateCode: true,
    maxRetries: 3,
    saveFailedCode: true,
    archiveGenerations: true,
    ...overrides,
  };
}
