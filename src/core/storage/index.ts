import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { OutputPaths } from "../config/index.js";
import { RunArtifactSchema, type RunArtifact } from "../schemas/index.js";

/**
 * File-based output store.
 * Keeps generated scripts, failed candidates, archived successes and
 * run artifacts on disk under the configured base directory.
 */
export class OutputStore {
  constructor(private readonly paths: OutputPaths) {}

  /** Ensure all output directories exist. */
  async initialize(): Promise<void> {
    const dirs = [
      this.paths.generatedDir,
      this.paths.archiveDir,
      this.paths.rendersDir,
      this.paths.modelsDir,
      this.paths.blendFilesDir,
      this.paths.runsDir,
    ];
    for (const dir of dirs) {
      await fs.mkdir(dir, { recursive: true });
    }
  }

  // ── Scripts ───────────────────────────────────────────────────────

  /** Write a generated script as generated_<stamp>.py. */
  async saveScript(code: string, stamp: string): Promise<string> {
    const filepath = path.join(this.paths.generatedDir, `generated_${stamp}.py`);
    await fs.writeFile(filepath, code, "utf-8");
    return filepath;
  }

  /** Keep a rejected or failing candidate for diagnostics. */
  async saveFailedScript(code: string, stamp: string): Promise<string> {
    const filepath = path.join(this.paths.generatedDir, `failed_${stamp}.py`);
    await fs.writeFile(filepath, code, "utf-8");
    return filepath;
  }

  /** Copy a successful script into the archive directory. */
  async archiveScript(scriptPath: string): Promise<string> {
    const archivePath = path.join(this.paths.archiveDir, path.basename(scriptPath));
    await fs.copyFile(scriptPath, archivePath);
    return archivePath;
  }

  // ── Run Artifacts ─────────────────────────────────────────────────

  /** Store a pipeline run artifact as JSON. */
  async saveRunArtifact(artifact: RunArtifact): Promise<string> {
    const filepath = path.join(this.paths.runsDir, `${artifact.runId}.json`);
    await fs.writeFile(filepath, JSON.stringify(artifact, null, 2), "utf-8");
    return filepath;
  }

  /** Load a run artifact by ID; null when it does not exist. */
  async loadRunArtifact(runId: string): Promise<RunArtifact | null> {
    const filepath = path.join(this.paths.runsDir, `${path.basename(runId)}.json`);
    let data: string;
    try {
      data = await fs.readFile(filepath, "utf-8");
    } catch (error) {
      if (isMissing(error)) return null;
      throw error;
    }
    return RunArtifactSchema.parse(JSON.parse(data));
  }

  /** List stored run artifacts, oldest first. */
  async listRunArtifacts(): Promise<RunArtifact[]> {
    const files = await this.listFiles(this.paths.runsDir, ".json");
    const runs: RunArtifact[] = [];
    for (const file of files) {
      const data = await fs.readFile(file, "utf-8");
      runs.push(RunArtifactSchema.parse(JSON.parse(data)));
    }
    return runs.sort((a, b) => a.startedAt.localeCompare(b.startedAt));
  }

  // ── Helpers ───────────────────────────────────────────────────────

  private async listFiles(dir: string, ext: string): Promise<string[]> {
    try {
      const entries = await fs.readdir(dir, { withFileTypes: true });
      return entries
        .filter((e) => e.isFile() && e.name.endsWith(ext))
        .map((e) => path.join(dir, e.name));
    } catch (error) {
      if (isMissing(error)) return [];
      throw error;
    }
  }
}

/** Filesystem-safe local timestamp: YYYYMMDD_HHMMSS. */
export function fileStamp(date: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
