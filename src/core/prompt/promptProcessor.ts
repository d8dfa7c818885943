import { createLogger } from "../logger.js";
import {
  CATEGORY_NAMES,
  type Complexity,
  type Entities,
  type Measurement,
  type ProcessedPrompt,
  type PromptCategory,
  type PromptType,
  type Quantity,
} from "../schemas/index.js";
import { defaultVocabulary, type Vocabulary } from "./vocabulary.js";

const logger = createLogger("prompt-processor");

/** A category also counts as a winner when it scores at least this share of the top score. */
const MIXED_THRESHOLD = 0.7;

const EDGE_PUNCTUATION = /^[.,!?;:]+|[.,!?;:]+$/g;

// "<digits> <word>", where a word may contain any letter ("5 cafés").
const QUANTITY_PATTERN = /(?<![\p{L}\p{N}_])(\d+)\s+([\p{L}\p{N}_]+)/gu;

const PROMPT_TYPES: Record<PromptCategory, PromptType> = {
  modeling: "modeling",
  material: "material",
  scene: "scene",
  animation: "animation",
  mixed: "base",
};

export interface PromptProcessorOptions {
  vocabulary?: Vocabulary;
}

/**
 * Rule-based prompt classifier.
 * Cleans a free-text request, assigns a category and complexity bucket,
 * pulls out entities and measurements, and appends generation directives.
 * Every method is pure: the same input always yields the same output.
 */
export class PromptProcessor {
  private readonly vocabulary: Vocabulary;
  private readonly measurementPattern: RegExp;
  private readonly abbreviationPatterns: Array<{ pattern: RegExp; replacement: string }>;

  constructor(options: PromptProcessorOptions = {}) {
    this.vocabulary = options.vocabulary ?? defaultVocabulary();

    const units = Object.keys(this.vocabulary.units).map(escapeRegExp).join("|");
    this.measurementPattern = new RegExp(`(\\d+\\.?\\d*)\\s*(${units})`, "gi");

    // Longest first so "w/o" is expanded before "w/" can claim its prefix.
    this.abbreviationPatterns = Object.entries(this.vocabulary.abbreviations)
      .sort(([a], [b]) => b.length - a.length)
      .map(([abbreviation, replacement]) => ({
        pattern: new RegExp(`(?<!\\w)${escapeRegExp(abbreviation)}(?!\\w)`, "gi"),
        replacement,
      }));
  }

  process(prompt: string): ProcessedPrompt {
    const cleaned = this.clean(prompt);
    const category = this.categorize(cleaned);
    const entities = this.extractEntities(cleaned);
    const measurements = this.extractMeasurements(cleaned);
    const complexity = this.assessComplexity(cleaned, entities);
    const enhanced = this.enhance(cleaned, category, measurements);

    logger.info({ category, complexity }, "Processed prompt");
    logger.debug({ entities }, "Entities found");

    return {
      original: prompt,
      cleaned,
      enhanced,
      category,
      complexity,
      entities,
      measurements,
      promptType: promptTypeFor(category),
    };
  }

  clean(prompt: string): string {
    let cleaned = prompt.split(/\s+/).filter(Boolean).join(" ");
    cleaned = cleaned.replace(EDGE_PUNCTUATION, "");

    for (const { pattern, replacement } of this.abbreviationPatterns) {
      cleaned = cleaned.replace(pattern, replacement);
    }
    return cleaned;
  }

  /**
   * Keywords are matched as substrings, so "stonework" still counts
   * towards the material category through "stone".
   */
  categorize(prompt: string): PromptCategory {
    const lower = prompt.toLowerCase();
    const scores = CATEGORY_NAMES.map((category) => ({
      category,
      score: this.vocabulary.categories[category].filter((k) => lower.includes(k)).length,
    }));

    const maxScore = Math.max(...scores.map((s) => s.score));
    if (maxScore === 0) {
      return "modeling";
    }

    const highScoring = scores.filter((s) => s.score >= maxScore * MIXED_THRESHOLD);
    if (highScoring.length > 1) {
      return "mixed";
    }

    const winner = scores.find((s) => s.score === maxScore);
    return winner?.category ?? "modeling";
  }

  extractEntities(prompt: string): Entities {
    const quantities: Quantity[] = [];
    for (const match of prompt.matchAll(QUANTITY_PATTERN)) {
      const [, digits, noun] = match;
      if (digits === undefined || noun === undefined) continue;

      const count = Number(digits);
      // Counts past the safe integer range lose digits; drop them.
      if (Number.isSafeInteger(count)) {
        quantities.push({ count, noun });
      }
    }

    return {
      // Object names also match their plural ("cubes").
      objects: this.vocabulary.objects.filter((term) => containsWord(prompt, `${escapeRegExp(term)}s?`)),
      colors: this.vocabulary.colors.filter((term) => containsWord(prompt, escapeRegExp(term))),
      materials: this.vocabulary.materials.filter((term) => containsWord(prompt, escapeRegExp(term))),
      quantities,
    };
  }

  extractMeasurements(prompt: string): Measurement[] {
    const measurements: Measurement[] = [];
    for (const match of prompt.matchAll(this.measurementPattern)) {
      const [, value, unit] = match;
      if (value === undefined || unit === undefined) continue;

      const originalValue = parseFloat(value);
      const factor = this.vocabulary.units[unit.toLowerCase()] ?? 1;
      const convertedValue = originalValue * factor;
      if (!Number.isFinite(originalValue) || !Number.isFinite(convertedValue)) continue;

      measurements.push({
        originalValue,
        originalUnit: unit,
        convertedValue,
        convertedUnit: "meters",
      });
    }
    return measurements;
  }

  assessComplexity(prompt: string, entities: Entities): Complexity {
    const wordCount = prompt.split(/\s+/).filter(Boolean).length;
    const entityCount =
      entities.objects.length +
      entities.colors.length +
      entities.materials.length +
      entities.quantities.length;

    let score = band(wordCount, 50, 20) + band(entityCount, 10, 5);

    const lower = prompt.toLowerCase();
    if (this.vocabulary.advancedKeywords.some((k) => lower.includes(k))) {
      score += 2;
    }

    if (score <= 3) return "simple";
    if (score <= 6) return "medium";
    return "complex";
  }

  enhance(prompt: string, category: PromptCategory, measurements: Measurement[]): string {
    const lower = prompt.toLowerCase();
    const directives: string[] = [];

    if (category === "modeling" && !lower.includes("scale")) {
      directives.push("Use realistic proportions and scales.");
    }
    if (category === "material" && !lower.includes("node")) {
      directives.push("Use node-based materials with Principled BSDF.");
    }
    if (category === "scene" && !lower.includes("camera")) {
      directives.push("Set up appropriate camera positioning.");
    }
    if (measurements.length > 0) {
      directives.push("(Note: measurements converted to Blender units)");
    }

    return [prompt, ...directives].join(" ");
  }

  /** Hints for making a prompt easier to turn into a scene. */
  suggestImprovements(prompt: string): string[] {
    const suggestions: string[] = [];
    const lower = prompt.toLowerCase();
    const { vagueWords, relativeSizeWords, hintObjectWords, hintSurfaceWords } = this.vocabulary;

    if (vagueWords.some((w) => lower.includes(w))) {
      suggestions.push("Be more specific about what you want to create");
    }

    if (prompt.split(/\s+/).filter(Boolean).length < 5) {
      suggestions.push("Add more details about size, color, or placement");
    }

    if (relativeSizeWords.some((w) => lower.includes(w)) && !/\d/.test(prompt)) {
      suggestions.push("Specify exact measurements instead of relative sizes");
    }

    const hasObject = hintObjectWords.some((w) => lower.includes(w));
    const hasSurface = hintSurfaceWords.some((w) => lower.includes(w));
    if (hasObject && !hasSurface) {
      suggestions.push("Consider specifying colors or materials");
    }

    return suggestions;
  }
}

export function promptTypeFor(category: PromptCategory): PromptType {
  return PROMPT_TYPES[category] ?? "base";
}

function band(value: number, high: number, mid: number): number {
  if (value > high) return 3;
  if (value > mid) return 2;
  return 1;
}

function containsWord(text: string, pattern: string): boolean {
  return new RegExp(`\\b${pattern}\\b`, "i").test(text);
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&");
}
