import { createLogger } from "../logger.js";
import type { ValidationReport } from "../schemas/index.js";
import { findSyntaxError } from "./pythonSyntax.js";

const logger = createLogger("code-validator");

export interface ValidatorRules {
  /** Substrings that reject a candidate wherever they appear. */
  dangerousOperations: string[];
  /** Call fragments that reject a candidate unless commented out on their line. */
  fileOperations: string[];
  /** Modules that may not be imported. */
  networkModules: string[];
  /** Modules every script should import. */
  requiredModules: string[];
  /** Any of these counts as clearing the scene. */
  sceneClearingCalls: string[];
  /** Operator calls tolerated before the active object must be set explicitly. */
  maxOperatorsWithoutActiveObject: number;
  /** Minimum ratio of comment markers to newlines before suggesting comments. */
  minCommentRatio: number;
  /** Newline count past which a script without functions gets a suggestion. */
  longScriptLines: number;
  /** Operator count past which collections are suggested. */
  manyOperators: number;
}

export const DEFAULT_VALIDATOR_RULES: ValidatorRules = {
  dangerousOperations: ["os.system", "subprocess", "eval", "exec", "__import__", "compile", "open"],
  fileOperations: ["open(", "write(", "read(", "remove(", "unlink("],
  networkModules: ["urllib", "requests", "socket", "http"],
  requiredModules: ["bpy"],
  sceneClearingCalls: ["bpy.ops.object.select_all", "bpy.ops.object.delete"],
  maxOperatorsWithoutActiveObject: 5,
  minCommentRatio: 0.1,
  longScriptLines: 50,
  manyOperators: 10,
};

export const SCENE_CLEARING_SNIPPET = [
  "# Clear existing objects",
  "bpy.ops.object.select_all(action='SELECT')",
  "bpy.ops.object.delete()",
  "",
  "",
].join("\n");

/**
 * CodeValidator
 * Static checks on a generated bpy script before it reaches Blender:
 *   1. Syntax      – parse failure is the only error reported
 *   2. Security    – deny-listed calls, file access, network imports (errors)
 *   3. Imports     – missing or implied modules (warnings)
 *   4. API usage   – scene clearing, naming, active object, linking (warnings)
 * Stages 2-4 are raw-text heuristics; they do not look at the parse tree.
 */
export class CodeValidator {
  private readonly rules: ValidatorRules;

  constructor(rules: Partial<ValidatorRules> = {}) {
    this.rules = { ...DEFAULT_VALIDATOR_RULES, ...rules };
  }

  validate(code: string): ValidationReport {
    const syntaxError = findSyntaxError(code);
    if (syntaxError) {
      const message = `Syntax Error at line ${syntaxError.line}: ${syntaxError.message}`;
      logger.error(message);
      return { isValid: false, errors: [message], warnings: [] };
    }

    const errors = this.checkSecurity(code);
    const warnings = [...this.checkImports(code), ...this.checkBlenderApi(code)];
    const isValid = errors.length === 0;

    if (isValid) {
      logger.info("Code validation passed");
    } else {
      logger.error({ errors }, `Code validation failed with ${errors.length} errors`);
    }
    if (warnings.length > 0) {
      logger.warn(`Code has ${warnings.length} warnings`);
    }

    return { isValid, errors, warnings };
  }

  checkSecurity(code: string): string[] {
    const issues: string[] = [];

    for (const dangerous of this.rules.dangerousOperations) {
      if (code.includes(dangerous)) {
        issues.push(`Dangerous operation detected: ${dangerous}`);
      }
    }

    for (const op of this.rules.fileOperations) {
      if (code.includes(op) && !isOnlyInComments(code, op)) {
        issues.push(`File operation detected: ${op}`);
      }
    }

    for (const mod of this.rules.networkModules) {
      if (code.includes(`import ${mod}`) || code.includes(`from ${mod}`)) {
        issues.push(`Network operation detected: ${mod}`);
      }
    }

    if (issues.length > 0) {
      logger.warn({ issues }, "Security issues found");
    }
    return issues;
  }

  checkImports(code: string): string[] {
    const warnings: string[] = [];

    for (const required of this.rules.requiredModules) {
      if (!code.includes(`import ${required}`) && !code.includes(`from ${required}`)) {
        warnings.push(`Missing recommended import: ${required}`);
      }
    }

    const lower = code.toLowerCase();
    if (lower.includes("math") && !code.includes("import math")) {
      warnings.push("Code mentions 'math' but doesn't import math module");
    }
    if (lower.includes("vector") && !code.includes("from mathutils import")) {
      warnings.push("Code mentions 'vector' but doesn't import from mathutils");
    }

    return warnings;
  }

  checkBlenderApi(code: string): string[] {
    const warnings: string[] = [];

    if (!this.clearsScene(code)) {
      warnings.push("Code doesn't clear existing objects - may cause conflicts");
    }

    if (code.includes("bpy.ops.mesh") || code.includes("bpy.ops.curve")) {
      if (!code.includes(".name =") && !code.includes("name=")) {
        warnings.push("Objects created but not named - may be hard to reference");
      }
    }

    if (
      !code.includes("bpy.context.view_layer.objects.active") &&
      countOccurrences(code, "bpy.ops.") > this.rules.maxOperatorsWithoutActiveObject
    ) {
      warnings.push("Many operations without setting active object - may cause issues");
    }

    if (
      code.includes("bpy.data.objects.new") &&
      !code.includes("scene.collection.objects.link") &&
      !code.includes("bpy.context.collection.objects.link")
    ) {
      warnings.push("Objects created but not linked to scene collection");
    }

    return warnings;
  }

  /** Advisory hints; never affect validity. */
  getSuggestions(code: string): string[] {
    const suggestions: string[] = [];
    const newlines = countOccurrences(code, "\n");

    if (!code.includes("try:")) {
      suggestions.push("Consider adding try-except blocks for error handling");
    }

    const commentRatio = countOccurrences(code, "#") / Math.max(newlines, 1);
    if (commentRatio < this.rules.minCommentRatio) {
      suggestions.push("Consider adding more comments to explain the code");
    }

    if (newlines > this.rules.longScriptLines && !code.includes("def ")) {
      suggestions.push("Consider organizing code into functions for better readability");
    }

    if (
      countOccurrences(code, "bpy.ops.") > this.rules.manyOperators &&
      !code.includes("bpy.data.collections")
    ) {
      suggestions.push("Consider using collections to organize many objects");
    }

    return suggestions;
  }

  /**
   * Prepend the bpy import and insert the scene-clearing snippet after the
   * last top-level import. Applying it twice gives the same text as once.
   */
  autoFix(code: string): string {
    let fixed = code;

    if (!fixed.includes("import bpy") && !fixed.includes("from bpy")) {
      fixed = `import bpy\n${fixed}`;
    }

    if (!fixed.includes("bpy.ops.object.select_all")) {
      const lines = fixed.split("\n");
      let importEnd = 0;
      lines.forEach((line, i) => {
        if (line.startsWith("import ") || line.startsWith("from ")) {
          importEnd = i + 1;
        }
      });
      lines.splice(importEnd, 0, SCENE_CLEARING_SNIPPET);
      fixed = lines.join("\n");
    }

    logger.info("Applied auto-fixes to code");
    return fixed;
  }

  private clearsScene(code: string): boolean {
    return this.rules.sceneClearingCalls.some((call) => code.includes(call));
  }
}

/**
 * True when every line containing `pattern` has it after a `#`.
 * Only single lines are inspected; docstrings and multi-line strings are not.
 */
function isOnlyInComments(code: string, pattern: string): boolean {
  for (const line of code.split("\n")) {
    const at = line.indexOf(pattern);
    if (at === -1) continue;
    const hash = line.indexOf("#");
    if (hash === -1 || at < hash) {
      return false;
    }
  }
  return true;
}

function countOccurrences(text: string, needle: string): number {
  return text.split(needle).length - 1;
}
