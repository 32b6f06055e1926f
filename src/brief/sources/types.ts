/**
 * Item source contracts
 */

import { z } from "zod";

/**
 * An IR release or news item as delivered by a source, before selection.
 *
 * Conventional fields are title, date, source, url and summary, but upstream
 * data is heterogeneous: any of them may be missing or carry another type.
 */
export type RawItem = Readonly<Record<string, unknown>>;

export const RawItemListSchema = z.array(z.record(z.unknown()));

export type FixtureKind = "ir" | "news";

/**
 * Company details resolved for a ticker
 */
export interface StockInfo {
  ticker: string;
  name: string;
  market?: string;
}

/**
 * Local sample data used in demo mode
 */
export interface FixtureSource {
  read(kind: FixtureKind, ticker: string, date: string): Promise<RawItem[]>;
}

/**
 * Network-backed data used in every other mode.
 * "No data" yields empty results; transport faults reject.
 */
export interface LiveSource {
  fetchIr(ticker: string, companyName: string): Promise<RawItem[]>;
  fetchNews(ticker: string, companyName: string): Promise<RawItem[]>;
  fetchStockInfo(ticker: string): Promise<StockInfo>;
}

/**
 * Read a textual field from a raw item. Numbers are stringified, anything
 * else counts as absent.
 */
export function readText(item: RawItem, key: string): string | undefined {
  const value = item[key];
  if (typeof value === "string") return value;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return undefined;
}
