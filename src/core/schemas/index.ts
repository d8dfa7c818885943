import { z } from "zod";

// ── Prompt classification ─────────────────────────────────────────────
export const CATEGORY_NAMES = ["modeling", "material", "scene", "animation"] as const;

export const KeywordCategorySchema = z.enum(CATEGORY_NAMES);
export type KeywordCategory = z.infer<typeof KeywordCategorySchema>;

export const PromptCategorySchema = z.enum(["modeling", "material", "scene", "animation", "mixed"]);
export type PromptCategory = z.infer<typeof PromptCategorySchema>;

export const ComplexitySchema = z.enum(["simple", "medium", "complex"]);
export type Complexity = z.infer<typeof ComplexitySchema>;

export const PromptTypeSchema = z.enum(["base", "modeling", "material", "scene", "animation"]);
export type PromptType = z.infer<typeof PromptTypeSchema>;

export const QuantitySchema = z.object({
  count: z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER),
  noun: z.string().min(1),
});
export type Quantity = z.infer<typeof QuantitySchema>;

export const EntitiesSchema = z.object({
  objects: z.array(z.string()),
  colors: z.array(z.string()),
  materials: z.array(z.string()),
  quantities: z.array(QuantitySchema),
});
export type Entities = z.infer<typeof EntitiesSchema>;

export const MeasurementSchema = z.object({
  originalValue: z.number().finite(),
  originalUnit: z.string().min(1),
  convertedValue: z.number().finite(),
  convertedUnit: z.literal("meters"),
});
export type Measurement = z.infer<typeof MeasurementSchema>;

export const ProcessedPromptSchema = z.object({
  original: z.string(),
  cleaned: z.string(),
  enhanced: z.string(),
  category: PromptCategorySchema,
  complexity: ComplexitySchema,
  entities: EntitiesSchema,
  measurements: z.array(MeasurementSchema),
  promptType: PromptTypeSchema,
});
export type ProcessedPrompt = z.infer<typeof ProcessedPromptSchema>;

// ── Code validation ───────────────────────────────────────────────────
export const ValidationReportSchema = z
  .object({
    isValid: z.boolean(),
    errors: z.array(z.string()),
    warnings: z.array(z.string()),
  })
  .refine((r) => r.isValid === (r.errors.length === 0), {
    message: "isValid must be true exactly when there are no errors",
  });
export type ValidationReport = z.infer<typeof ValidationReportSchema>;

// ── Blender execution ─────────────────────────────────────────────────
export const ExecutionModeSchema = z.enum(["background", "gui"]);
export type ExecutionMode = z.infer<typeof ExecutionModeSchema>;

export const ExportFormatSchema = z.enum(["obj", "fbx", "gltf", "stl", "ply"]);
export type ExportFormat = z.infer<typeof ExportFormatSchema>;

export const ScriptRunResultSchema = z.object({
  success: z.boolean(),
  stdout: z.string(),
  stderr: z.string(),
});
export type ScriptRunResult = z.infer<typeof ScriptRunResultSchema>;

export const ExecutionResultSchema = ScriptRunResultSchema.extend({
  scriptPath: z.string().min(1),
  renderPath: z.string().nullable(),
  exportPath: z.string().nullable(),
  blendPath: z.string().nullable(),
});
export type ExecutionResult = z.infer<typeof ExecutionResultSchema>;

// ── Pipeline run ──────────────────────────────────────────────────────
export const GenerationAttemptSchema = z.object({
  attempt: z.number().int().positive(),
  report: ValidationReportSchema.nullable(),
  error: z.string().nullable(),
});
export type GenerationAttempt = z.infer<typeof GenerationAttemptSchema>;

export const RunArtifactSchema = z.object({
  runId: z.string().uuid(),
  parentRunId: z.string().uuid().nullable(),
  request: z.string(),
  prompt: ProcessedPromptSchema,
  attempts: z.array(GenerationAttemptSchema),
  code: z.string().nullable(),
  scriptPath: z.string().nullable(),
  failedScriptPath: z.string().nullable(),
  execution: ExecutionResultSchema.nullable(),
  success: z.boolean(),
  error: z.string().nullable(),
  startedAt: z.string().datetime(),
  completedAt: z.string().datetime(),
});
export type RunArtifact = z.infer<typeof RunArtifactSchema>;
