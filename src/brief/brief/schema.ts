/**
 * Schemas for the brief document and its persisted JSON form
 */

import { z } from "zod";

/** Ticker symbols as they appear in artifact filenames, e.g. NOKIA.HE or BRK-B */
export const TickerSchema = z
  .string()
  .min(1)
  .max(32)
  .regex(/^[A-Za-z0-9][A-Za-z0-9.\-^=]*$/, "Invalid ticker symbol");

export const BriefDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "Date must be formatted as YYYY-MM-DD");

export const IRReleaseSchema = z.object({
  title: z.string(),
  date: z.string(),
  source: z.string(),
  url: z.string(),
  summary: z.string().optional(),
});

export type IRRelease = z.infer<typeof IRReleaseSchema>;

export const NewsItemSchema = z.object({
  title: z.string(),
  source: z.string(),
  url: z.string(),
  date: z.string().optional(),
  summary: z.string().optional(),
});

export type NewsItem = z.infer<typeof NewsItemSchema>;

export const BriefSchema = z.object({
  date: z.string(),
  ticker: z.string(),
  summary_bullets: z.array(z.string()),
  ir_releases: z.array(IRReleaseSchema),
  news: z.array(NewsItemSchema),
  drivers: z.array(z.string()),
  risks: z.array(z.string()),
  limitations: z.array(z.string()),
});

export type Brief = z.infer<typeof BriefSchema>;

/**
 * Parse a persisted JSON artifact back into a brief
 */
export function parseBrief(value: unknown): Brief {
  return BriefSchema.parse(value);
}
