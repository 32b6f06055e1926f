/**
 * Network-backed item sources: Yahoo Finance headlines for news, Google News
 * search for press releases, and company name resolution
 */

import { z } from "zod";
import { errorMessage } from "../errors.js";
import type { BriefLogger } from "../runtime/logger.js";
import type { FileCache } from "../storage/file-cache.js";
import { parseRssItems, type RssItem } from "./rss.js";
import { findTicker } from "./tickers.js";
import { type LiveSource, type RawItem, RawItemListSchema, type StockInfo } from "./types.js";

export const USER_AGENT = "ir-brief-agent/1.0";

/** Items kept from a single feed */
export const FEED_ITEM_LIMIT = 20;

const YAHOO_SOURCE = "Yahoo Finance";
const GOOGLE_NEWS_SOURCE = "Google News";

export function yahooHeadlinesUrl(ticker: string): string {
  return `https://feeds.finance.yahoo.com/rss/2.0/headline?s=${encodeURIComponent(ticker)}&region=US&lang=en-US`;
}

export function googleNewsSearchUrl(query: string): string {
  return `https://news.google.com/rss/search?q=${encodeURIComponent(query)}&hl=en-US&gl=US&ceid=US:en`;
}

export function yahooSearchUrl(ticker: string): string {
  return `https://query2.finance.yahoo.com/v1/finance/search?q=${encodeURIComponent(ticker)}&quotesCount=1&newsCount=0`;
}

const YahooSearchSchema = z.object({
  quotes: z
    .array(
      z.object({
        longname: z.string().optional(),
        shortname: z.string().optional(),
        exchDisp: z.string().optional(),
      }),
    )
    .default([]),
});

const StockInfoSchema = z.object({
  ticker: z.string(),
  name: z.string(),
  market: z.string().optional(),
});

export interface LiveFetchersOptions {
  logger: BriefLogger;
  cache?: FileCache;
  fetchImpl?: typeof fetch;
}

function toRawItem(item: RssItem, fallbackSource: string): RawItem {
  return {
    title: item.title,
    date: item.date,
    source: item.source ?? fallbackSource,
    url: item.url,
  };
}

export class LiveFetchers implements LiveSource {
  private readonly logger: BriefLogger;
  private readonly cache?: FileCache;
  private readonly fetchImpl: typeof fetch;

  constructor(options: LiveFetchersOptions) {
    this.logger = options.logger;
    this.cache = options.cache;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  private async cached<T>(
    key: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    load: () => Promise<{ value: T; cacheable: boolean }>,
  ): Promise<T> {
    if (this.cache) {
      const hit = schema.safeParse(await this.cache.get(key));
      if (hit.success) return hit.data;
    }

    const { value, cacheable } = await load();
    if (this.cache && cacheable) {
      await this.cache.set(key, value);
    }
    return value;
  }

  /**
   * GET a URL. Returns undefined for a non-OK status; network errors reject.
   */
  private async get(url: string): Promise<Response | undefined> {
    const response = await this.fetchImpl(url, { headers: { "user-agent": USER_AGENT } });
    if (!response.ok) {
      this.logger.warn(`Request failed with HTTP ${response.status}`, { url });
      return undefined;
    }
    return response;
  }

  private async readFeed(url: string, fallbackSource: string): Promise<{ value: RawItem[]; cacheable: boolean }> {
    const response = await this.get(url);
    if (!response) return { value: [], cacheable: false };

    const items = parseRssItems(await response.text(), FEED_ITEM_LIMIT).map((item) =>
      toRawItem(item, fallbackSource),
    );
    return { value: items, cacheable: true };
  }

  async fetchNews(ticker: string, _companyName: string): Promise<RawItem[]> {
    const url = yahooHeadlinesUrl(ticker);
    const items = await this.cached(`news:${url}`, RawItemListSchema, () =>
      this.readFeed(url, YAHOO_SOURCE),
    );
    this.logger.info(`Fetched ${items.length} news items`, { ticker });
    return items;
  }

  async fetchIr(ticker: string, companyName: string): Promise<RawItem[]> {
    const url = googleNewsSearchUrl(`"${companyName || ticker}" press release`);
    const items = await this.cached(`ir:${url}`, RawItemListSchema, () =>
      this.readFeed(url, GOOGLE_NEWS_SOURCE),
    );
    this.logger.info(`Fetched ${items.length} IR releases`, { ticker });
    return items;
  }

  async fetchStockInfo(ticker: string): Promise<StockInfo> {
    const known = findTicker(ticker);
    if (known) {
      return { ticker: known.ticker, name: known.name, market: known.market };
    }

    return this.cached(`stock:${ticker.toUpperCase()}`, StockInfoSchema, async () => {
      const response = await this.get(yahooSearchUrl(ticker));
      if (!response) {
        return { value: { ticker, name: "" }, cacheable: false };
      }

      const body = await response.text();
      let raw: unknown;
      try {
        raw = JSON.parse(body);
      } catch (error) {
        this.logger.warn(`Stock search returned invalid JSON: ${errorMessage(error)}`, { ticker });
        return { value: { ticker, name: "" }, cacheable: false };
      }

      const parsed = YahooSearchSchema.safeParse(raw);
      const quote = parsed.success ? parsed.data.quotes[0] : undefined;
      const name = quote?.longname ?? quote?.shortname ?? "";
      const info: StockInfo = { ticker, name, ...(quote?.exchDisp ? { market: quote.exchDisp } : {}) };
      return { value: info, cacheable: name !== "" };
    });
  }
}
