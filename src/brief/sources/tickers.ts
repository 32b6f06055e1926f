/**
 * Bundled ticker directory used for search and company name lookup
 */

import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";

const TickerEntrySchema = z.object({
  ticker: z.string(),
  name: z.string(),
  market: z.string(),
});

export type TickerEntry = z.infer<typeof TickerEntrySchema>;

export const DEFAULT_SEARCH_LIMIT = 10;

const TICKERS_FILE = fileURLToPath(new URL("../../../data/tickers.json", import.meta.url));

let directory: TickerEntry[] | null = null;

/**
 * Load the ticker directory (read once per process)
 */
export function loadTickers(): TickerEntry[] {
  if (!directory) {
    const raw: unknown = JSON.parse(fs.readFileSync(TICKERS_FILE, "utf-8"));
    directory = z.array(TickerEntrySchema).parse(raw);
  }
  return directory;
}

/**
 * Search by ticker or company name. Ticker prefix matches rank first, then
 * other ticker matches, then name-only matches; ties order by ticker.
 */
export function searchTickers(
  query: string,
  limit = DEFAULT_SEARCH_LIMIT,
  entries: readonly TickerEntry[] = loadTickers(),
): TickerEntry[] {
  if (!query) {
    return entries.slice(0, Math.max(0, limit));
  }

  const needle = query.toLowerCase();
  const matches: Array<{ score: number; entry: TickerEntry }> = [];

  for (const entry of entries) {
    const ticker = entry.ticker.toLowerCase();
    const tickerMatch = ticker.includes(needle);
    if (!tickerMatch && !entry.name.toLowerCase().includes(needle)) {
      continue;
    }
    const score = ticker.startsWith(needle) ? 2 : tickerMatch ? 1 : 0;
    matches.push({ score, entry });
  }

  matches.sort((a, b) => {
    if (a.score !== b.score) return b.score - a.score;
    return a.entry.ticker < b.entry.ticker ? -1 : a.entry.ticker > b.entry.ticker ? 1 : 0;
  });

  return matches.slice(0, Math.max(0, limit)).map((match) => match.entry);
}

/**
 * Exact, case-insensitive ticker lookup
 */
export function findTicker(
  ticker: string,
  entries: readonly TickerEntry[] = loadTickers(),
): TickerEntry | undefined {
  const wanted = ticker.toUpperCase();
  return entries.find((entry) => entry.ticker.toUpperCase() === wanted);
}
