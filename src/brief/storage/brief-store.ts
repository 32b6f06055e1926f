/**
 * Brief artifacts on disk: brief_<TICKER>_<DATE>.md and .json
 */

import fs from "node:fs/promises";
import path from "node:path";
import { renderMarkdown } from "../brief/render.js";
import { type Brief, parseBrief } from "../brief/schema.js";
import { BriefError, BriefErrorCode, isNotFoundError } from "../errors.js";

export interface BriefFiles {
  reportPath: string;
  jsonPath: string;
}

export interface BriefListing {
  filename: string;
  ticker: string;
  date: string;
  /** Modification time, ISO 8601 */
  timestamp: string;
}

export type StoredBrief =
  | { kind: "json"; filename: string; brief: Brief }
  | { kind: "markdown"; filename: string; content: string };

const JSON_ARTIFACT = /^brief_(.+)_(\d{4}-\d{2}-\d{2})\.json$/;
const ANY_ARTIFACT = /^brief_.+_\d{4}-\d{2}-\d{2}\.(json|md)$/;

export function briefBaseName(ticker: string, date: string): string {
  return `brief_${ticker}_${date}`;
}

/**
 * Write the markdown report and the JSON artifact. Existing files for the
 * same ticker and date are overwritten.
 */
export async function writeBriefFiles(brief: Brief, outputDir: string): Promise<BriefFiles> {
  await fs.mkdir(outputDir, { recursive: true });

  const base = briefBaseName(brief.ticker, brief.date);
  const reportPath = path.join(outputDir, `${base}.md`);
  const jsonPath = path.join(outputDir, `${base}.json`);

  await fs.writeFile(reportPath, renderMarkdown(brief), "utf-8");
  await fs.writeFile(jsonPath, JSON.stringify(brief, null, 2), "utf-8");

  return { reportPath, jsonPath };
}

/**
 * List JSON artifacts, newest first
 */
export async function listBriefs(outputDir: string): Promise<BriefListing[]> {
  let names: string[];
  try {
    names = await fs.readdir(outputDir);
  } catch (error) {
    if (isNotFoundError(error)) return [];
    throw error;
  }

  const entries: Array<BriefListing & { mtimeMs: number }> = [];
  for (const filename of names) {
    const match = filename.match(JSON_ARTIFACT);
    if (!match) continue;

    const stat = await fs.stat(path.join(outputDir, filename));
    entries.push({
      filename,
      ticker: match[1],
      date: match[2],
      timestamp: stat.mtime.toISOString(),
      mtimeMs: stat.mtimeMs,
    });
  }

  entries.sort((a, b) => b.mtimeMs - a.mtimeMs);
  return entries.map(({ filename, ticker, date, timestamp }) => ({ filename, ticker, date, timestamp }));
}

/**
 * Read one artifact by file name
 */
export async function readBriefFile(outputDir: string, filename: string): Promise<StoredBrief> {
  if (filename !== path.basename(filename) || filename.includes("\\") || !ANY_ARTIFACT.test(filename)) {
    throw new BriefError(BriefErrorCode.INVALID_FILENAME, `Invalid brief filename: ${filename}`);
  }

  let content: string;
  try {
    content = await fs.readFile(path.join(outputDir, filename), "utf-8");
  } catch (error) {
    if (isNotFoundError(error)) {
      throw new BriefError(BriefErrorCode.BRIEF_NOT_FOUND, `Brief not found: ${filename}`, {
        cause: error,
      });
    }
    throw error;
  }

  if (filename.endsWith(".json")) {
    return { kind: "json", filename, brief: parseBrief(JSON.parse(content)) };
  }
  return { kind: "markdown", filename, content };
}
