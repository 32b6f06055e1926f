/**
 * Shared base for generation backends backed by a hosted model
 */

import { z } from "zod";
import type { GenerationMode } from "../config/types.js";
import { MissingCredentialError, errorMessage } from "../errors.js";
import type { BriefLogger } from "../runtime/logger.js";
import { type RawItem, readText } from "../sources/types.js";
import { DeterministicBackend } from "./deterministic.js";
import type { GeneratedSections, GenerationBackend, GenerationContext } from "./types.js";

/** Items per list embedded in a prompt */
export const PROMPT_ITEM_LIMIT = 5;

const MAX_REMOTE_BULLETS = 6;

export const DEFAULT_REMOTE_LIMITATIONS: readonly string[] = [
  "Generated with AI analysis.",
  "Not investment advice.",
];

export type RemoteMode = Exclude<GenerationMode, "demo">;

export interface RemoteBackendOptions {
  model: string;
  maxTokens: number;
  /** Environment the credential is read from (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
}

/**
 * Remote backend. Construction fails with MissingCredentialError when the
 * provider's API key is not set; `generate` makes one blocking call and
 * rethrows whatever the provider raises.
 *
 * Section generation defaults to the deterministic template.
 */
export abstract class RemoteBackend implements GenerationBackend {
  abstract readonly mode: RemoteMode;

  protected readonly apiKey: string;
  protected readonly model: string;
  protected readonly maxTokens: number;
  protected readonly fallback = new DeterministicBackend();

  constructor(
    protected readonly logger: BriefLogger,
    envVar: string,
    options: RemoteBackendOptions,
  ) {
    const apiKey = (options.env ?? process.env)[envVar];
    if (!apiKey) {
      throw new MissingCredentialError(envVar);
    }
    this.apiKey = apiKey;
    this.model = options.model;
    this.maxTokens = options.maxTokens;
  }

  /**
   * Provider call returning the raw completion text
   */
  protected abstract complete(prompt: string): Promise<string>;

  async generate(prompt: string): Promise<string> {
    try {
      return await this.complete(prompt);
    } catch (error) {
      this.logger.error(`${this.mode} API error: ${errorMessage(error)}`, { model: this.model });
      throw error;
    }
  }

  async generateSections(context: GenerationContext): Promise<GeneratedSections> {
    return this.fallback.generateSections(context);
  }
}

/**
 * Remote backend that asks the model for the sections as JSON and falls back
 * to the template when the answer cannot be used
 */
export abstract class StructuredRemoteBackend extends RemoteBackend {
  override async generateSections(context: GenerationContext): Promise<GeneratedSections> {
    const prompt = buildSectionsPrompt(context);

    try {
      const response = await this.generate(prompt);
      return parseSectionsResponse(response);
    } catch (error) {
      this.logger.warn(
        `Failed to parse ${this.mode} response: ${errorMessage(error)}, using template fallback`,
      );
      return this.fallback.generateSections(context);
    }
  }
}

/**
 * Format items as prompt lines: "- title: summary-or-source"
 */
export function formatItemsForPrompt(items: readonly RawItem[]): string {
  if (items.length === 0) {
    return "No items available.";
  }
  return items
    .slice(0, PROMPT_ITEM_LIMIT)
    .map((item) => {
      const title = readText(item, "title") ?? "No title";
      const detail = readText(item, "summary") ?? readText(item, "source") ?? "";
      return `- ${title}: ${detail}`;
    })
    .join("\n");
}

/**
 * Build the prompt asking for the brief's sections as a JSON object
 */
export function buildSectionsPrompt(context: GenerationContext): string {
  return [
    `You are a financial analyst writing a brief about ${context.ticker} for ${context.date}.`,
    "",
    "Based on the data below, produce:",
    "1. summary_bullets: the 3-6 most important observations",
    "2. drivers: 3 key growth drivers",
    "3. risks: 3 key risks",
    "",
    "IR releases:",
    formatItemsForPrompt(context.irReleases),
    "",
    "News:",
    formatItemsForPrompt(context.news),
    "",
    "Respond in JSON with the keys: summary_bullets, drivers, risks, limitations.",
    "Include a limitations array with caveats about this analysis.",
  ].join("\n");
}

const RemoteSectionsSchema = z.object({
  summary_bullets: z.array(z.string()).default([]),
  drivers: z.array(z.string()).default([]),
  risks: z.array(z.string()).default([]),
  limitations: z.array(z.string()).optional(),
});

/**
 * Locate the JSON object in a free-form model answer (it may be wrapped in
 * prose or a markdown fence) and read the sections from it
 */
export function parseSectionsResponse(text: string): GeneratedSections {
  const match = text.match(/\{[\s\S]*\}/);
  if (!match) {
    throw new Error("No JSON object found in response");
  }

  const parsed = RemoteSectionsSchema.parse(JSON.parse(match[0]));

  return {
    summary_bullets: parsed.summary_bullets.slice(0, MAX_REMOTE_BULLETS),
    drivers: parsed.drivers,
    risks: parsed.risks,
    limitations: parsed.limitations ?? [...DEFAULT_REMOTE_LIMITATIONS],
  };
}
