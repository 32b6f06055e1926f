/**
 * Tests for the file cache
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { BriefLogger } from "../runtime/logger.js";
import { FileCache, hashKey } from "./file-cache.js";

function createMockLogger(): BriefLogger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    step: vi.fn(),
    flush: vi.fn().mockResolvedValue(undefined),
  };
}

const HOUR_MS = 60 * 60 * 1000;

describe("FileCache", () => {
  let dir: string;
  let logger: BriefLogger;
  let now: number;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "brief-cache-"));
    logger = createMockLogger();
    now = Date.UTC(2026, 0, 18, 12);
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  function createCache(ttlHours = 24): FileCache {
    return new FileCache(dir, ttlHours, logger, () => now);
  }

  it("hashes keys with sha256", () => {
    expect(hashKey("abc")).toBe("ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad");
  });

  it("returns undefined on a miss", async () => {
    await expect(createCache().get("missing")).resolves.toBeUndefined();
  });

  it("stores and returns values", async () => {
    const cache = createCache();
    await cache.set("news:ACME", [{ title: "a" }]);

    await expect(cache.get("news:ACME")).resolves.toEqual([{ title: "a" }]);
    const stored = JSON.parse(await fs.readFile(path.join(dir, `${hashKey("news:ACME")}.json`), "utf-8"));
    expect(stored).toEqual({ timestamp: now, value: [{ title: "a" }] });
  });

  it("creates the cache directory on first write", async () => {
    const nested = path.join(dir, "nested", "cache");
    const cache = new FileCache(nested, 1, logger, () => now);

    await cache.set("k", 1);

    await expect(fs.readdir(nested)).resolves.toHaveLength(1);
  });

  it("expires and deletes old entries", async () => {
    const cache = createCache(1);
    await cache.set("k", "v");

    now += HOUR_MS + 1;

    await expect(cache.get("k")).resolves.toBeUndefined();
    await expect(fs.readdir(dir)).resolves.toEqual([]);
  });

  it("keeps entries within the ttl", async () => {
    const cache = createCache(1);
    await cache.set("k", "v");

    now += HOUR_MS;

    await expect(cache.get("k")).resolves.toBe("v");
  });

  it("drops invalid entries with a warning", async () => {
    await fs.writeFile(path.join(dir, `${hashKey("k")}.json`), "{ broken");

    await expect(createCache().get("k")).resolves.toBeUndefined();
    expect(logger.warn).toHaveBeenCalledTimes(1);
    await expect(fs.readdir(dir)).resolves.toEqual([]);
  });

  it("clears every entry", async () => {
    const cache = createCache();
    await cache.set("a", 1);
    await cache.set("b", 2);

    await expect(cache.clear()).resolves.toBe(2);
    await expect(cache.get("a")).resolves.toBeUndefined();
  });

  it("clears nothing when the directory does not exist", async () => {
    const cache = new FileCache(path.join(dir, "absent"), 1, logger, () => now);
    await expect(cache.clear()).resolves.toBe(0);
  });

  it("clears only expired and unreadable entries", async () => {
    const cache = createCache(1);
    await cache.set("old", 1);
    now += 2 * HOUR_MS;
    await cache.set("fresh", 2);
    await fs.writeFile(path.join(dir, "garbage.json"), "not json");

    await expect(cache.clearExpired()).resolves.toBe(2);
    await expect(cache.get("fresh")).resolves.toBe(2);
    await expect(fs.readdir(dir)).resolves.toEqual([`${hashKey("fresh")}.json`]);
  });
});
