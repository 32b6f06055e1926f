/**
 * Sample data reader for demo mode
 */

import fs from "node:fs/promises";
import path from "node:path";
import { errorMessage, isNotFoundError } from "../errors.js";
import type { BriefLogger } from "../runtime/logger.js";
import { type FixtureKind, type FixtureSource, type RawItem, RawItemListSchema } from "./types.js";

export function fixturePath(dataDir: string, kind: FixtureKind): string {
  return path.join(dataDir, `sample_${kind}.json`);
}

/**
 * Reads `<dataDir>/sample_ir.json` and `<dataDir>/sample_news.json`.
 * Every ticker and date gets the same sample set.
 */
export class FixtureReader implements FixtureSource {
  constructor(
    private readonly dataDir: string,
    private readonly logger: BriefLogger,
  ) {}

  async read(kind: FixtureKind, ticker: string, date: string): Promise<RawItem[]> {
    const file = fixturePath(this.dataDir, kind);

    let content: string;
    try {
      content = await fs.readFile(file, "utf-8");
    } catch (error) {
      if (isNotFoundError(error)) {
        this.logger.warn(`Sample ${kind} file not found: ${file}`);
        return [];
      }
      throw error;
    }

    try {
      const items = RawItemListSchema.parse(JSON.parse(content));
      this.logger.info(`Loaded ${items.length} ${kind} items from sample data`, { ticker, date });
      return items;
    } catch (error) {
      this.logger.warn(`Failed to parse sample ${kind} data: ${errorMessage(error)}`, { file });
      return [];
    }
  }
}
