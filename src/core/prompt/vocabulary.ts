import * as fs from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";

const TermListSchema = z.array(z.string().min(1).toLowerCase());

export const VocabularySchema = z.object({
  /** Keyword lists per category; key order is the scoring order. */
  categories: z.object({
    modeling: TermListSchema,
    material: TermListSchema,
    scene: TermListSchema,
    animation: TermListSchema,
  }),
  objects: TermListSchema,
  colors: TermListSchema,
  materials: TermListSchema,
  /** Unit token → factor to meters. Key order is the regex alternation order. */
  units: z.record(z.string().min(1), z.number().positive()),
  advancedKeywords: TermListSchema,
  abbreviations: z.record(z.string().min(1), z.string()),
  vagueWords: TermListSchema,
  relativeSizeWords: TermListSchema,
  hintObjectWords: TermListSchema,
  hintSurfaceWords: TermListSchema,
});
export type Vocabulary = z.infer<typeof VocabularySchema>;

export const DEFAULT_VOCABULARY_PATH = fileURLToPath(
  new URL("../../../data/vocabulary.json", import.meta.url),
);

let cached: Vocabulary | null = null;

/** Read and validate a vocabulary file. */
export function loadVocabulary(filePath: string = DEFAULT_VOCABULARY_PATH): Vocabulary {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  return VocabularySchema.parse(raw);
}

/** The bundled vocabulary, loaded once per process. */
export function defaultVocabulary(): Vocabulary {
  cached ??= loadVocabulary();
  return cached;
}
