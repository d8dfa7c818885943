#!/usr/bin/env node
import "dotenv/config";
import * as readline from "node:readline/promises";
import { loadConfig, type AppConfig } from "../core/config/index.js";
import { BlenderExecutor } from "../core/execution/blenderExecutor.js";
import { Orchestrator, type RunOptions } from "../core/pipeline/orchestrator.js";
import type { RunArtifact } from "../core/schemas/index.js";
import { setLogLevel } from "../core/logger.js";
import { createLLMProvider } from "../providers/index.js";
import { parseCliArgs, USAGE, type CliOptions } from "./args.js";

const PREVIEW_LINES = 15;
const QUIT_WORDS = new Set(["quit", "exit", "q"]);
const RULE = "───────────────────────────────────────────────────────";

async function main(): Promise<number> {
  const parsed = parseCliArgs(process.argv.slice(2));
  if (!parsed.ok) {
    console.error(`${parsed.error}\n\n${USAGE}`);
    return 1;
  }
  const options = parsed.options;
  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  const env = options.provider ? { ...process.env, AI_PROVIDER: options.provider } : process.env;
  const config = loadConfig(env);
  setLogLevel(config.logLevel);
  const llm = createLLMProvider(config);

  let executor: BlenderExecutor | undefined;
  if (!options.dryRun) {
    executor = createExecutor(config);
    await executor.initialize();
  }

  const orchestrator = new Orchestrator({ llm, settings: config, executor });
  await orchestrator.initialize();

  console.log("═══════════════════════════════════════════════════════");
  console.log("  Blender Scene AI");
  console.log("═══════════════════════════════════════════════════════");
  console.log(`  Provider: ${llm.name}`);
  console.log(`  Mode:     ${options.dryRun ? "dry run" : (options.mode ?? config.defaultMode)}`);
  console.log(`${RULE}\n`);

  const runOptions = toRunOptions(options);

  if (options.interactive) {
    await interactive(orchestrator, runOptions);
    return 0;
  }

  const artifact = await orchestrator.run(options.prompt, runOptions);
  printSummary(artifact);
  return artifact.success ? 0 : 1;
}

function createExecutor(config: AppConfig): BlenderExecutor {
  return new BlenderExecutor({
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
}

function toRunOptions(options: CliOptions): RunOptions {
  return {
    mode: options.mode,
    render: options.render,
    export: options.export,
    save: options.save,
    validate: options.validate,
    dryRun: options.dryRun,
  };
}

async function interactive(orchestrator: Orchestrator, runOptions: RunOptions): Promise<void> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  console.log("Enter your prompts to generate Blender scenes.");
  console.log("Type 'quit' or 'exit' to stop.\n");

  try {
    for (;;) {
      const prompt = (await rl.question("Describe what you want to create:\n> ")).trim();
      if (QUIT_WORDS.has(prompt.toLowerCase())) break;
      if (!prompt) continue;

      const hints = orchestrator.getProcessor().suggestImprovements(prompt);
      for (const hint of hints) {
        console.log(`  hint: ${hint}`);
      }

      try {
        let artifact = await orchestrator.run(prompt, runOptions);
        printSummary(artifact);

        while (artifact.success) {
          const answer = (await rl.question("\nWould you like to refine this? (y/n): ")).trim().toLowerCase();
          if (answer !== "y") break;
          const feedback = (await rl.question("What changes would you like? ")).trim();
          if (!feedback) break;
          artifact = await orchestrator.refine(artifact, feedback, runOptions);
          printSummary(artifact);
        }
      } catch (error) {
        const message = error instanceof Error ? error.message : "Unknown error";
        console.error(`\n❌ Error: ${message}\n`);
      }

      console.log(`\n${RULE}\n`);
    }
  } finally {
    rl.close();
  }
  console.log("\nGoodbye!");
}

function printSummary(artifact: RunArtifact): void {
  const { prompt } = artifact;
  console.log(`\n  Run ID:     ${artifact.runId}`);
  console.log(`  Category:   ${prompt.category} (${prompt.complexity})`);
  console.log(`  Attempts:   ${artifact.attempts.length}`);

  const lastReport = artifact.attempts[artifact.attempts.length - 1]?.report;
  for (const error of lastReport?.errors ?? []) {
    console.log(`  error:      ${error}`);
  }
  for (const warning of (lastReport?.warnings ?? []).slice(0, 3)) {
    console.log(`  warning:    ${warning}`);
  }

  if (artifact.code) {
    const lines = artifact.code.split("\n");
    console.log(`\n── Generated Code ${RULE.slice(18)}`);
    for (const line of lines.slice(0, PREVIEW_LINES)) {
      console.log(`  ${line}`);
    }
    if (lines.length > PREVIEW_LINES) {
      console.log(`  ... (${lines.length - PREVIEW_LINES} more lines)`);
    }
    console.log(RULE);
  }

  if (artifact.success) {
    console.log("\n✅ Success!\n");
  } else {
    console.log(`\n❌ Failed: ${artifact.error ?? "unknown error"}\n`);
  }

  const paths: Array<[string, string | null]> = [
    ["Script", artifact.scriptPath],
    ["Render", artifact.execution?.renderPath ?? null],
    ["Export", artifact.execution?.exportPath ?? null],
    ["Blend file", artifact.execution?.blendPath ?? null],
    ["Failed code", artifact.failedScriptPath],
  ];
  for (const [label, value] of paths) {
    if (value) console.log(`  ${`${label}:`.padEnd(12)}${value}`);
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    const message = error instanceof Error ? error.message : "Unknown error";
    console.error(`\n❌ Fatal error: ${message}`);
    process.exitCode = 1;
  });
