/**
 * Generation backend contract
 */

import { z } from "zod";
import type { GenerationMode } from "../config/types.js";
import type { RawItem } from "../sources/types.js";

/**
 * Input to section generation: the selected items for one ticker and date
 */
export interface GenerationContext {
  ticker: string;
  date: string;
  irReleases: readonly RawItem[];
  news: readonly RawItem[];
}

export const GeneratedSectionsSchema = z.object({
  summary_bullets: z.array(z.string()),
  drivers: z.array(z.string()),
  risks: z.array(z.string()),
  limitations: z.array(z.string()),
});

/**
 * Prose sections of a brief
 */
export type GeneratedSections = z.infer<typeof GeneratedSectionsSchema>;

/**
 * A text generation backend
 */
export interface GenerationBackend {
  /** Mode this backend serves */
  readonly mode: GenerationMode;
  /** Produce free-form text for a prompt */
  generate(prompt: string): Promise<string>;
  /** Produce the brief's prose sections */
  generateSections(context: GenerationContext): Promise<GeneratedSections>;
}
