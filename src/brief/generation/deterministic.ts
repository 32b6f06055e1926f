/**
 * Deterministic template backend.
 *
 * Builds every section from item counts and truncated titles only. It never
 * fails and performs no I/O, which makes it the fallback for every remote
 * backend and the reference output in tests.
 */

import { readText } from "../sources/types.js";
import type { GeneratedSections, GenerationBackend, GenerationContext } from "./types.js";

const NEWS_TITLE_LIMIT = 100;
const IR_TITLE_LIMIT = 80;
const DRIVER_TITLE_LIMIT = 80;
const SOURCE_SAMPLE = 3;

const MIN_BULLETS = 3;
const MAX_BULLETS = 6;
const DRIVER_COUNT = 3;

export const TEMPLATE_RISKS: readonly string[] = [
  "Market conditions may affect the share price.",
  "General risks related to the industry.",
  "Exchange rate and interest rate effects on earnings.",
];

export const TEMPLATE_LIMITATIONS: readonly string[] = [
  "This brief is based on automated news retrieval.",
  "The analysis is not investment advice.",
  "Verify details from the company's official sources.",
];

const DRIVER_FILLER = "More details are available on the company's investor relations pages.";

function summaryFiller(ticker: string): string {
  return `Analysis is based on public news about ${ticker}.`;
}

function uniqueSources(context: GenerationContext): string[] {
  const sources: string[] = [];
  for (const item of context.news.slice(0, SOURCE_SAMPLE)) {
    const source = readText(item, "source");
    if (source && !sources.includes(source)) {
      sources.push(source);
    }
  }
  return sources;
}

/**
 * Build brief sections from the selected items
 */
export function buildTemplateSections(context: GenerationContext): GeneratedSections {
  const { ticker, irReleases, news } = context;
  const summary: string[] = [];

  if (news.length > 0) {
    const title = readText(news[0], "title");
    if (title) {
      summary.push(`News: ${title.slice(0, NEWS_TITLE_LIMIT)}...`);
    }
    summary.push(`Found ${news.length} news items about ${ticker}.`);

    const sources = uniqueSources(context);
    if (sources.length > 0) {
      summary.push(`Sources: ${sources.join(", ")}`);
    }
  }

  if (irReleases.length > 0) {
    summary.push(`${ticker} released ${irReleases.length} IR announcements in the review period.`);
    const title = readText(irReleases[0], "title");
    if (title) {
      summary.push(`Key release: ${title.slice(0, IR_TITLE_LIMIT)}`);
    }
  }

  while (summary.length < MIN_BULLETS) {
    summary.push(summaryFiller(ticker));
  }

  const drivers: string[] = [];
  for (const item of news.slice(0, DRIVER_COUNT)) {
    const title = readText(item, "title");
    if (title) {
      drivers.push(`News driver: ${title.slice(0, DRIVER_TITLE_LIMIT)}`);
    }
  }
  while (drivers.length < DRIVER_COUNT) {
    drivers.push(DRIVER_FILLER);
  }

  return {
    summary_bullets: summary.slice(0, MAX_BULLETS),
    drivers: drivers.slice(0, DRIVER_COUNT),
    risks: [...TEMPLATE_RISKS],
    limitations: [...TEMPLATE_LIMITATIONS],
  };
}

export class DeterministicBackend implements GenerationBackend {
  readonly mode = "demo" as const;

  async generate(prompt: string): Promise<string> {
    return `[Demo Response] Processed prompt with ${prompt.length} characters.`;
  }

  async generateSections(context: GenerationContext): Promise<GeneratedSections> {
    return buildTemplateSections(context);
  }
}
