import * as fs from "node:fs/promises";
import * as path from "node:path";
import { createLogger } from "../logger.js";
import type { PromptType } from "../schemas/index.js";
import type { GenerateOptions, LLMProvider } from "../../providers/llm-provider.js";

const logger = createLogger("code-generator");

const PROMPT_FILES: Record<PromptType, string> = {
  base: "base_system_prompt.txt",
  modeling: "modeling_expert.txt",
  material: "material_expert.txt",
  scene: "scene_expert.txt",
  animation: "animation_expert.txt",
};

export const DEFAULT_SYSTEM_PROMPT = `You are an expert Blender Python (bpy) developer.
Generate clean, working Python code for Blender based on user descriptions.

Requirements:
- Always clear existing objects first
- Import necessary modules (bpy, math, mathutils)
- Add clear comments
- Use realistic scales
- Return ONLY Python code in a code block
- No explanations outside the code block

Format:
\`\`\`python
import bpy
# Your code here
\`\`\`
`;

/** Comment lines that talk about the answer rather than the scene. */
const CHATTY_COMMENT_WORDS = ["here", "this", "above", "below"];

export interface GenerationContext {
  previousCode?: string;
  objects?: string[];
}

export interface CodeGeneratorConfig {
  llm: LLMProvider;
  promptsDir: string;
  temperature?: number;
  maxTokens?: number;
}

/**
 * CodeGenerator
 * Picks the system instructions for a prompt type, asks the LLM for a bpy
 * script, and strips the markdown around it.
 */
export class CodeGenerator {
  private readonly llm: LLMProvider;
  private readonly promptsDir: string;
  private readonly defaults: GenerateOptions;

  constructor(config: CodeGeneratorConfig) {
    this.llm = config.llm;
    this.promptsDir = config.promptsDir;
    this.defaults = { temperature: config.temperature, maxTokens: config.maxTokens };
  }

  async loadSystemPrompt(promptType: PromptType = "base"): Promise<string> {
    let file = path.join(this.promptsDir, PROMPT_FILES[promptType]);

    if (!(await exists(file))) {
      logger.warn({ file }, "Prompt file not found, using base prompt");
      file = path.join(this.promptsDir, PROMPT_FILES.base);
    }

    try {
      const content = await fs.readFile(file, "utf-8");
      logger.debug({ file: path.basename(file) }, "Loaded system prompt");
      return content;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error({ error: message }, "Failed to load system prompt, using built-in default");
      return DEFAULT_SYSTEM_PROMPT;
    }
  }

  async generateCode(
    userPrompt: string,
    promptType: PromptType = "base",
    options: GenerateOptions = {},
  ): Promise<string> {
    const systemPrompt = await this.loadSystemPrompt(promptType);

    logger.info({ provider: this.llm.name, prompt: userPrompt.slice(0, 50) }, "Generating code");

    const raw = await this.llm.generate(systemPrompt, userPrompt, {
      temperature: options.temperature ?? this.defaults.temperature,
      maxTokens: options.maxTokens ?? this.defaults.maxTokens,
    });
    const code = cleanCode(raw);

    logger.info({ lines: code.split("\n").length }, "Code generation successful");
    return code;
  }

  /** Ask for a complete updated script that applies the feedback. */
  async refineCode(originalCode: string, feedback: string, promptType: PromptType = "base"): Promise<string> {
    const refinementPrompt = [
      "Here's the current Blender Python code:",
      "",
      "```python",
      originalCode,
      "```",
      "",
      `User feedback: ${feedback}`,
      "",
      "Please provide the complete updated code with the requested changes.",
      "Return ONLY the Python code, no explanations.",
    ].join("\n");

    logger.info({ feedback: feedback.slice(0, 50) }, "Refining code");
    return this.generateCode(refinementPrompt, promptType);
  }

  /** Generate against an existing scene: previous code and object names. */
  async generateWithContext(
    userPrompt: string,
    context: GenerationContext,
    promptType: PromptType = "base",
  ): Promise<string> {
    let enhanced = userPrompt;

    if (context.previousCode) {
      enhanced = [
        "Previous code in the scene:",
        "```python",
        context.previousCode,
        "```",
        "",
        `New request: ${userPrompt}`,
        "",
        "Generate code that works with the existing scene.",
      ].join("\n");
    }

    if (context.objects && context.objects.length > 0) {
      enhanced += `\n\nExisting objects: ${context.objects.join(", ")}`;
    }

    return this.generateCode(enhanced, promptType);
  }
}

/**
 * Extract the script from a completion: the first ```python block, else the
 * first bare ``` block, else the whole text. Comment lines that refer to the
 * answer itself ("here", "this", ...) are dropped.
 */
export function cleanCode(raw: string): string {
  let code = raw.trim();

  if (code.includes("```python")) {
    const after = code.split("```python")[1] ?? "";
    code = (after.split("```")[0] ?? "").trim();
  } else if (code.includes("```")) {
    const parts = code.split("```");
    if (parts.length >= 3) {
      code = (parts[1] ?? "").trim();
    }
  }

  return code
    .split("\n")
    .filter((line) => {
      if (!line.trim().startsWith("#")) return true;
      const lower = line.toLowerCase();
      return !CHATTY_COMMENT_WORDS.some((word) => lower.includes(word));
    })
    .join("\n");
}

async function exists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
}
