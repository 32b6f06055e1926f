/**
 * TTL cache on disk for live fetch results
 */

import crypto from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { errorMessage, isNotFoundError } from "../errors.js";
import type { BriefLogger } from "../runtime/logger.js";

const CacheEntrySchema = z.object({
  timestamp: z.number(),
  value: z.unknown(),
});

const HOUR_MS = 60 * 60 * 1000;

export function hashKey(key: string): string {
  return crypto.createHash("sha256").update(key).digest("hex");
}

/**
 * Each entry is `<dir>/<sha256(key)>.json` holding {timestamp, value}.
 * Expired and unreadable entries are deleted when encountered.
 */
export class FileCache {
  private readonly ttlMs: number;

  constructor(
    private readonly dir: string,
    ttlHours: number,
    private readonly logger: BriefLogger,
    private readonly now: () => number = Date.now,
  ) {
    this.ttlMs = ttlHours * HOUR_MS;
  }

  private entryPath(key: string): string {
    return path.join(this.dir, `${hashKey(key)}.json`);
  }

  private isExpired(timestamp: number): boolean {
    return this.now() - timestamp > this.ttlMs;
  }

  async get(key: string): Promise<unknown> {
    const file = this.entryPath(key);

    let content: string;
    try {
      content = await fs.readFile(file, "utf-8");
    } catch (error) {
      if (isNotFoundError(error)) return undefined;
      throw error;
    }

    let entry: z.infer<typeof CacheEntrySchema>;
    try {
      entry = CacheEntrySchema.parse(JSON.parse(content));
    } catch (error) {
      this.logger.warn(`Invalid cache entry: ${errorMessage(error)}`, { file });
      await fs.rm(file, { force: true });
      return undefined;
    }

    if (this.isExpired(entry.timestamp)) {
      this.logger.debug(`Cache expired for key: ${key.slice(0, 40)}`);
      await fs.rm(file, { force: true });
      return undefined;
    }

    this.logger.debug(`Cache hit for key: ${key.slice(0, 40)}`);
    return entry.value;
  }

  async set(key: string, value: unknown): Promise<void> {
    await fs.mkdir(this.dir, { recursive: true });
    const entry = { timestamp: this.now(), value };
    await fs.writeFile(this.entryPath(key), JSON.stringify(entry, null, 2), "utf-8");
    this.logger.debug(`Cached value for key: ${key.slice(0, 40)}`);
  }

  private async entryFiles(): Promise<string[]> {
    try {
      const names = await fs.readdir(this.dir);
      return names.filter((name) => name.endsWith(".json")).map((name) => path.join(this.dir, name));
    } catch (error) {
      if (isNotFoundError(error)) return [];
      throw error;
    }
  }

  /**
   * Remove every entry. Returns the number removed.
   */
  async clear(): Promise<number> {
    const files = await this.entryFiles();
    for (const file of files) {
      await fs.rm(file, { force: true });
    }
    this.logger.info(`Cleared ${files.length} cache entries`);
    return files.length;
  }

  /**
   * Remove expired and unreadable entries. Returns the number removed.
   */
  async clearExpired(): Promise<number> {
    let count = 0;

    for (const file of await this.entryFiles()) {
      const parsed = CacheEntrySchema.safeParse(await readJson(file));
      if (!parsed.success || this.isExpired(parsed.data.timestamp)) {
        await fs.rm(file, { force: true });
        count++;
      }
    }

    if (count > 0) {
      this.logger.info(`Removed ${count} expired cache entries`);
    }
    return count;
  }
}

async function readJson(file: string): Promise<unknown> {
  try {
    return JSON.parse(await fs.readFile(file, "utf-8"));
  } catch (error) {
    if (error instanceof SyntaxError) return undefined;
    throw error;
  }
}
