import { execFile } from "node:child_process";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { v4 as uuidv4 } from "uuid";
import { createLogger } from "../logger.js";
import type { OutputPaths, RenderSettings } from "../config/index.js";
import type {
  ExecutionMode,
  ExecutionResult,
  ExportFormat,
  ScriptRunResult,
} from "../schemas/index.js";
import { fileStamp } from "../storage/index.js";

const logger = createLogger("blender-executor");

const VERSION_TIMEOUT_MS = 10_000;
const MAX_OUTPUT_BYTES = 16 * 1024 * 1024;

export interface CommandOutput {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export interface CommandOptions {
  cwd?: string;
  timeoutMs: number;
}

/** Runs a program and collects its output. Rejects only when it cannot be started. */
export type CommandRunner = (
  command: string,
  args: string[],
  options: CommandOptions,
) => Promise<CommandOutput>;

export const runCommand: CommandRunner = (command, args, options) =>
  new Promise((resolve, reject) => {
    execFile(
      command,
      args,
      {
        cwd: options.cwd,
        timeout: options.timeoutMs,
        maxBuffer: MAX_OUTPUT_BYTES,
        encoding: "utf-8",
      },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ exitCode: 0, stdout, stderr, timedOut: false });
          return;
        }
        if (typeof error.code === "string") {
          // Spawn failure (ENOENT, EACCES, ...) rather than a non-zero exit.
          reject(error);
          return;
        }
        resolve({
          exitCode: typeof error.code === "number" ? error.code : null,
          stdout,
          stderr,
          timedOut: error.killed === true && error.signal === "SIGTERM",
        });
      },
    );
  });

export interface FinalizeTargets {
  renderPath?: string | null;
  exportPath?: string | null;
  blendPath?: string | null;
}

export interface PipelineOptions {
  mode?: ExecutionMode;
  render?: boolean;
  export?: boolean;
  save?: boolean;
  /** File-name stamp shared by every output of the run. Generated when omitted. */
  stamp?: string;
}

/** What the orchestrator needs from an executor. */
export interface SceneExecutor {
  executeFullPipeline(code: string, options?: PipelineOptions): Promise<ExecutionResult>;
}

export interface BlenderExecutorConfig {
  blenderPath: string;
  paths: OutputPaths;
  render: RenderSettings;
  exportFormat: ExportFormat;
  defaultMode: ExecutionMode;
  autoRender: boolean;
  autoExport: boolean;
  autoSave: boolean;
  timeoutMs: number;
  runner?: CommandRunner;
}

/**
 * BlenderExecutor
 * Appends render/export/save steps to a script, writes it to the generated
 * directory and runs it through the Blender executable.
 */
export class BlenderExecutor implements SceneExecutor {
  private readonly config: BlenderExecutorConfig;
  private readonly runner: CommandRunner;

  constructor(config: BlenderExecutorConfig) {
    this.config = config;
    this.runner = config.runner ?? runCommand;
  }

  /** Confirm the Blender executable answers `--version`. Returns the version line. */
  async initialize(): Promise<string> {
    const { blenderPath } = this.config;
    let output: CommandOutput;
    try {
      output = await this.runner(blenderPath, ["--version"], { timeoutMs: VERSION_TIMEOUT_MS });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Blender not found or not executable at: ${blenderPath} (${message})`);
    }
    if (output.exitCode !== 0) {
      throw new Error(`Blender not found or not executable at: ${blenderPath}`);
    }

    const version = output.stdout.split("\n")[0]?.trim() ?? "";
    logger.info({ version, blenderPath }, "Found Blender");
    return version;
  }

  async executeScript(
    scriptPath: string,
    mode: ExecutionMode = this.config.defaultMode,
    timeoutMs: number = this.config.timeoutMs,
  ): Promise<ScriptRunResult> {
    try {
      await fs.access(scriptPath);
    } catch {
      throw new Error(`Script not found: ${scriptPath}`);
    }

    const args = mode === "background" ? ["--background"] : [];
    args.push("--python", scriptPath);

    logger.info({ mode, script: path.basename(scriptPath) }, "Executing script");
    logger.debug({ command: [this.config.blenderPath, ...args].join(" ") }, "Command");

    let output: CommandOutput;
    try {
      output = await this.runner(this.config.blenderPath, args, {
        cwd: this.config.paths.baseDir,
        timeoutMs,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error({ error: message }, "Script execution error");
      return { success: false, stdout: "", stderr: message };
    }

    if (output.timedOut) {
      logger.error({ timeoutMs }, "Script execution timed out");
      return { success: false, stdout: output.stdout, stderr: "Execution timed out" };
    }

    const success = output.exitCode === 0;
    if (success) {
      logger.info("Script executed successfully");
    } else {
      logger.error({ exitCode: output.exitCode }, "Script execution failed");
    }
    return { success, stdout: output.stdout, stderr: output.stderr };
  }

  /** Python appended after the scene code for each requested output. */
  buildFinalizeCode(targets: FinalizeTargets, exportFormat: ExportFormat = this.config.exportFormat): string {
    const sections = ["", "import bpy", ""];

    if (targets.renderPath) {
      const { width, height, samples, engine } = this.config.render;
      const target = pyString(targets.renderPath);
      sections.push(
        "# Render",
        `bpy.context.scene.render.filepath = ${target}`,
        "bpy.context.scene.render.image_settings.file_format = 'PNG'",
        `bpy.context.scene.render.resolution_x = ${width}`,
        `bpy.context.scene.render.resolution_y = ${height}`,
        `bpy.context.scene.render.engine = '${engine}'`,
        "if bpy.context.scene.render.engine == 'CYCLES':",
        `    bpy.context.scene.cycles.samples = ${samples}`,
        "bpy.ops.render.render(write_still=True)",
        `print("Rendered to: " + ${target})`,
        "",
      );
    }

    if (targets.exportPath) {
      const target = pyString(targets.exportPath);
      sections.push(
        "# Export",
        `${EXPORT_OPERATORS[exportFormat]}(filepath=${target})`,
        `print("Exported to: " + ${target})`,
        "",
      );
    }

    if (targets.blendPath) {
      const target = pyString(targets.blendPath);
      sections.push(
        "# Save",
        `bpy.ops.wm.save_as_mainfile(filepath=${target})`,
        `print("Saved to: " + ${target})`,
        "",
      );
    }

    return sections.join("\n");
  }

  /**
   * Write `code` plus the requested finalize steps as combined_<stamp>.py
   * and execute it. Output paths share one stamp.
   */
  async executeFullPipeline(code: string, options: PipelineOptions = {}): Promise<ExecutionResult> {
    const mode = options.mode ?? this.config.defaultMode;
    const render = options.render ?? this.config.autoRender;
    const exportModel = options.export ?? this.config.autoExport;
    const save = options.save ?? this.config.autoSave;

    const stamp = options.stamp ?? uniqueStamp();
    const targets = {
      renderPath: render ? this.renderPathFor(stamp) : null,
      exportPath: exportModel ? this.exportPathFor(stamp) : null,
      blendPath: save ? this.blendPathFor(stamp) : null,
    };

    const scriptPath = await this.writeScript(`combined_${stamp}.py`, code, targets);
    const result = await this.executeScript(scriptPath, mode);

    return { ...result, scriptPath, ...targets };
  }

  async executeWithRender(code: string, renderPath?: string, mode?: ExecutionMode): Promise<ExecutionResult> {
    const stamp = uniqueStamp();
    const target = renderPath ?? this.renderPathFor(stamp);
    logger.info({ renderPath: target }, "Executing with render");
    return this.executeSingle(`render_${stamp}.py`, code, { renderPath: target }, mode);
  }

  async executeWithExport(
    code: string,
    exportPath?: string,
    exportFormat: ExportFormat = this.config.exportFormat,
    mode?: ExecutionMode,
  ): Promise<ExecutionResult> {
    const stamp = uniqueStamp();
    const target = exportPath ?? this.exportPathFor(stamp, exportFormat);
    logger.info({ exportPath: target, format: exportFormat }, "Executing with export");
    return this.executeSingle(`export_${stamp}.py`, code, { exportPath: target }, mode, exportFormat);
  }

  async executeWithSave(code: string, blendPath?: string, mode?: ExecutionMode): Promise<ExecutionResult> {
    const stamp = uniqueStamp();
    const target = blendPath ?? this.blendPathFor(stamp);
    logger.info({ blendPath: target }, "Executing with save");
    return this.executeSingle(`save_${stamp}.py`, code, { blendPath: target }, mode);
  }

  // ── Helpers ───────────────────────────────────────────────────────

  private async executeSingle(
    fileName: string,
    code: string,
    targets: FinalizeTargets,
    mode: ExecutionMode = this.config.defaultMode,
    exportFormat?: ExportFormat,
  ): Promise<ExecutionResult> {
    const scriptPath = await this.writeScript(fileName, code, targets, exportFormat);
    const result = await this.executeScript(scriptPath, mode);
    return {
      ...result,
      scriptPath,
      renderPath: targets.renderPath ?? null,
      exportPath: targets.exportPath ?? null,
      blendPath: targets.blendPath ?? null,
    };
  }

  private async writeScript(
    fileName: string,
    code: string,
    targets: FinalizeTargets,
    exportFormat?: ExportFormat,
  ): Promise<string> {
    const scriptPath = path.join(this.config.paths.generatedDir, fileName);
    await fs.mkdir(this.config.paths.generatedDir, { recursive: true });
    await fs.writeFile(scriptPath, `${code}\n${this.buildFinalizeCode(targets, exportFormat)}`, "utf-8");
    return scriptPath;
  }

  private renderPathFor(stamp: string): string {
    return path.join(this.config.paths.rendersDir, `render_${stamp}.png`);
  }

  private exportPathFor(stamp: string, format: ExportFormat = this.config.exportFormat): string {
    return path.join(this.config.paths.modelsDir, `model_${stamp}.${format}`);
  }

  private blendPathFor(stamp: string): string {
    return path.join(this.config.paths.blendFilesDir, `scene_${stamp}.blend`);
  }
}

export const EXPORT_OPERATORS: Record<ExportFormat, string> = {
  obj: "bpy.ops.wm.obj_export",
  fbx: "bpy.ops.export_scene.fbx",
  gltf: "bpy.ops.export_scene.gltf",
  stl: "bpy.ops.wm.stl_export",
  ply: "bpy.ops.wm.ply_export",
};

/** Second-resolution timestamp plus a random suffix, so concurrent runs never share files. */
function uniqueStamp(): string {
  return `${fileStamp()}_${uuidv4().slice(0, 8)}`;
}

/** A JSON string literal is also a valid Python string literal for paths. */
function pyString(value: string): string {
  return JSON.stringify(value);
}
