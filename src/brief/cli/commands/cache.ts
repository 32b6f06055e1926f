/**
 * brief-agent cache command - Manage the fetch cache
 */

import { Command } from "commander";
import { loadConfig } from "../../config/loader.js";
import { errorMessage } from "../../errors.js";
import { generateRunId } from "../../orchestrator/core.js";
import { createLogger } from "../../runtime/logger.js";
import { FileCache } from "../../storage/file-cache.js";

export function registerCacheCommand(program: Command): void {
  const cacheCmd = program.command("cache").description("Manage the fetch cache");

  cacheCmd
    .command("clear")
    .description("Remove cached fetch results")
    .option("--expired", "Only remove expired entries")
    .action(async (opts: { expired?: boolean }) => {
      try {
        const config = await loadConfig();
        const logger = createLogger(generateRunId(), config.logging, { quiet: true });
        const cache = new FileCache(config.cache.dir, config.cache.ttlHours, logger);

        const removed = opts.expired ? await cache.clearExpired() : await cache.clear();
        console.log(`✓ Removed ${removed} cache ${removed === 1 ? "entry" : "entries"}`);
        await logger.flush();
      } catch (error) {
        console.error(`Failed to clear cache: ${errorMessage(error)}`);
        process.exit(1);
      }
    });
}
