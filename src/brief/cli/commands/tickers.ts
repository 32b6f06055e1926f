/**
 * brief-agent tickers command - Search the bundled ticker directory
 */

import { Command } from "commander";
import { DEFAULT_SEARCH_LIMIT, searchTickers } from "../../sources/tickers.js";

export function registerTickersCommand(program: Command): void {
  program
    .command("tickers")
    .description("Search known tickers by symbol or company name")
    .argument("[query]", "Search text", "")
    .option("-n, --limit <n>", "Maximum results", (value) => parseInt(value, 10), DEFAULT_SEARCH_LIMIT)
    .option("--json", "Output as JSON")
    .action((query: string, opts: { limit: number; json?: boolean }) => {
      const results = searchTickers(query, Number.isNaN(opts.limit) ? DEFAULT_SEARCH_LIMIT : opts.limit);

      if (opts.json) {
        console.log(JSON.stringify(results, null, 2));
        return;
      }

      if (results.length === 0) {
        console.log(`No tickers match "${query}".`);
        return;
      }

      for (const entry of results) {
        console.log(`${entry.ticker.padEnd(14)} ${entry.name.padEnd(28)} ${entry.market}`);
      }
    });
}
