import { v4 as uuidv4 } from "uuid";
import { ZodError } from "zod";
import { createLogger } from "../logger.js";
import type { AppConfig } from "../config/index.js";
import { CodeGenerator } from "../generation/codeGenerator.js";
import { PromptProcessor } from "../prompt/promptProcessor.js";
import { CodeValidator } from "../validation/codeValidator.js";
import { OutputStore, fileStamp } from "../storage/index.js";
import type { PipelineOptions, SceneExecutor } from "../execution/blenderExecutor.js";
import {
  RunArtifactSchema,
  type ExecutionResult,
  type GenerationAttempt,
  type ProcessedPrompt,
  type RunArtifact,
} from "../schemas/index.js";
import type { LLMProvider } from "../../providers/llm-provider.js";

const logger = createLogger("orchestrator");

const STDERR_EXCERPT = 500;

export type OrchestratorSettings = Pick<
  AppConfig,
  | "paths"
  | "temperature"
  | "maxTokens"
  | "validateCode"
  | "maxRetries"
  | "saveFailedCode"
  | "archiveGenerations"
>;

export interface OrchestratorConfig {
  llm: LLMProvider;
  settings: OrchestratorSettings;
  /** Omit to generate and validate without running Blender. */
  executor?: SceneExecutor;
  processor?: PromptProcessor;
  validator?: CodeValidator;
  generator?: CodeGenerator;
}

export interface RunOptions extends PipelineOptions {
  validate?: boolean;
  maxRetries?: number;
  /** Stop after saving the script. */
  dryRun?: boolean;
}

interface CandidateOutcome {
  code: string | null;
  valid: boolean;
  attempts: GenerationAttempt[];
}

/**
 * Pipeline Orchestrator
 *   PromptProcessor → (CodeGenerator → CodeValidator) × maxRetries →
 *   OutputStore → SceneExecutor → archive
 *
 * A validation error or a generator failure asks for a fresh candidate.
 * When every attempt fails the run ends without executing and the last
 * candidate is kept as a failed script.
 * Every run is persisted as a schema-checked RunArtifact.
 */
export class Orchestrator {
  private readonly settings: OrchestratorSettings;
  private readonly store: OutputStore;
  private readonly executor: SceneExecutor | null;
  private readonly processor: PromptProcessor;
  private readonly validator: CodeValidator;
  private readonly generator: CodeGenerator;

  constructor(config: OrchestratorConfig) {
    this.settings = config.settings;
    this.store = new OutputStore(config.settings.paths);
    this.executor = config.executor ?? null;
    this.processor = config.processor ?? new PromptProcessor();
    this.validator = config.validator ?? new CodeValidator();
    this.generator =
      config.generator ??
      new CodeGenerator({
        llm: config.llm,
        promptsDir: config.settings.paths.promptsDir,
        temperature: config.settings.temperature,
        maxTokens: config.settings.maxTokens,
      });
  }

  async initialize(): Promise<void> {
    await this.store.initialize();
  }

  getStore(): OutputStore {
    return this.store;
  }

  getProcessor(): PromptProcessor {
    return this.processor;
  }

  getValidator(): CodeValidator {
    return this.validator;
  }

  async run(request: string, options: RunOptions = {}): Promise<RunArtifact> {
    const prompt = this.processor.process(request);
    return this.execute(request, prompt, null, options, () =>
      this.generator.generateCode(prompt.enhanced, prompt.promptType),
    );
  }

  /** Apply feedback to the code of an earlier run. */
  async refine(previous: RunArtifact, feedback: string, options: RunOptions = {}): Promise<RunArtifact> {
    const previousCode = previous.code;
    if (!previousCode) {
      throw new Error(`Run ${previous.runId} has no code to refine`);
    }
    const { prompt } = previous;
    return this.execute(feedback, prompt, previous.runId, options, () =>
      this.generator.refineCode(previousCode, feedback, prompt.promptType),
    );
  }

  private async execute(
    request: string,
    prompt: ProcessedPrompt,
    parentRunId: string | null,
    options: RunOptions,
    produce: () => Promise<string>,
  ): Promise<RunArtifact> {
    const runId = uuidv4();
    const startedAt = new Date().toISOString();
    const stamp = `${fileStamp()}_${runId.slice(0, 8)}`;

    logger.info(
      { runId, parentRunId, request: request.slice(0, 100), category: prompt.category },
      "Pipeline started",
    );

    try {
      const validate = options.validate ?? this.settings.validateCode;
      const maxRetries = Math.max(1, options.maxRetries ?? this.settings.maxRetries);
      const outcome = await this.produceCandidate(runId, produce, validate, maxRetries);

      let scriptPath: string | null = null;
      let failedScriptPath: string | null = null;
      let execution: ExecutionResult | null = null;
      let success = false;
      let error: string | null = null;

      if (!outcome.valid) {
        error = describeFailure(outcome.attempts, maxRetries);
        if (outcome.code !== null && this.settings.saveFailedCode) {
          failedScriptPath = await this.store.saveFailedScript(outcome.code, stamp);
        }
        logger.error({ runId, error }, "No valid candidate");
      } else if (outcome.code !== null) {
        scriptPath = await this.store.saveScript(outcome.code, stamp);
        logger.info({ runId, scriptPath }, "Script saved");

        if (options.dryRun || !this.executor) {
          success = true;
        } else {
          execution = await this.executor.executeFullPipeline(outcome.code, {
            mode: options.mode,
            render: options.render,
            export: options.export,
            save: options.save,
            stamp,
          });
          success = execution.success;

          if (success) {
            if (this.settings.archiveGenerations) {
              const archivePath = await this.store.archiveScript(scriptPath);
              logger.debug({ runId, archivePath }, "Archived generation");
            }
          } else {
            error = `Blender execution failed: ${execution.stderr.slice(0, STDERR_EXCERPT)}`;
            if (this.settings.saveFailedCode) {
              failedScriptPath = await this.store.saveFailedScript(outcome.code, stamp);
            }
          }
        }
      }

      const artifact: RunArtifact = {
        runId,
        parentRunId,
        request,
        prompt,
        attempts: outcome.attempts,
        code: outcome.code,
        scriptPath,
        failedScriptPath,
        execution,
        success,
        error,
        startedAt,
        completedAt: new Date().toISOString(),
      };

      RunArtifactSchema.parse(artifact);

      const artifactPath = await this.store.saveRunArtifact(artifact);
      logger.info({ runId, artifactPath, success }, "Pipeline completed");
      return artifact;
    } catch (error) {
      const errorMessage =
        error instanceof ZodError
          ? `Schema validation failed: ${error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join(", ")}`
          : error instanceof Error
            ? error.message
            : "Unknown error";

      logger.error({ runId, error: errorMessage }, "Pipeline failed");
      throw new Error(`Pipeline run ${runId} failed: ${errorMessage}`);
    }
  }

  private async produceCandidate(
    runId: string,
    produce: () => Promise<string>,
    validate: boolean,
    maxRetries: number,
  ): Promise<CandidateOutcome> {
    const attempts: GenerationAttempt[] = [];
    let code: string | null = null;

    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      if (attempt > 1) {
        logger.info({ runId, attempt, maxRetries }, "Retrying generation");
      }

      let candidate: string;
      try {
        candidate = await produce();
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error({ runId, attempt, error: message }, "Code generation failed");
        attempts.push({ attempt, report: null, error: message });
        continue;
      }

      if (!candidate.trim()) {
        attempts.push({ attempt, report: null, error: "Generator returned no code" });
        continue;
      }
      code = candidate;

      if (!validate) {
        attempts.push({ attempt, report: null, error: null });
        return { code, valid: true, attempts };
      }

      const report = this.validator.validate(candidate);
      attempts.push({ attempt, report, error: null });
      if (report.isValid) {
        return { code, valid: true, attempts };
      }
    }

    return { code, valid: false, attempts };
  }
}

function describeFailure(attempts: GenerationAttempt[], maxRetries: number): string {
  const last = attempts[attempts.length - 1];
  const reasons = last?.error ? [last.error] : (last?.report?.errors ?? []);
  const base = `Failed to generate valid code after ${maxRetries} attempts`;
  return reasons.length > 0 ? `${base}: ${reasons.join("; ")}` : base;
}
