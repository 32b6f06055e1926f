/**
 * Minimal RSS 2.0 item extraction
 */

export interface RssItem {
  title: string;
  url: string;
  /** YYYY-MM-DD, or "" when pubDate is missing or unparseable */
  date: string;
  /** Publisher named in the item's <source> element, if any */
  source?: string;
  summary?: string;
}

const ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
};

export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-fA-F]+|#\d+|[a-z]+);/g, (match, entity: string) => {
    if (entity.startsWith("#x")) {
      return String.fromCodePoint(Number.parseInt(entity.slice(2), 16));
    }
    if (entity.startsWith("#")) {
      return String.fromCodePoint(Number.parseInt(entity.slice(1), 10));
    }
    return ENTITIES[entity] ?? match;
  });
}

function readElement(block: string, tag: string): string | undefined {
  const match = block.match(new RegExp(`<${tag}(?:\\s[^>]*)?>([\\s\\S]*?)</${tag}>`));
  if (!match) return undefined;

  const raw = match[1].trim();
  const cdata = raw.match(/^<!\[CDATA\[([\s\S]*?)\]\]>$/);
  const text = cdata ? cdata[1] : decodeEntities(raw);
  return text.trim();
}

/**
 * Convert an RFC 822 pubDate to YYYY-MM-DD
 */
export function toIsoDate(pubDate: string | undefined): string {
  if (!pubDate) return "";
  const parsed = new Date(pubDate);
  return Number.isNaN(parsed.getTime()) ? "" : parsed.toISOString().slice(0, 10);
}

/**
 * Extract items from an RSS document. Items without a title or link are skipped.
 */
export function parseRssItems(xml: string, limit = Number.POSITIVE_INFINITY): RssItem[] {
  const items: RssItem[] = [];
  const itemRegex = /<item>([\s\S]*?)<\/item>/g;
  let match: RegExpExecArray | null;

  while ((match = itemRegex.exec(xml)) && items.length < limit) {
    const block = match[1];
    const title = readElement(block, "title");
    const url = readElement(block, "link");
    if (!title || !url) continue;

    const source = readElement(block, "source");
    const summary = readElement(block, "description");

    items.push({
      title,
      url,
      date: toIsoDate(readElement(block, "pubDate")),
      ...(source ? { source } : {}),
      ...(summary ? { summary } : {}),
    });
  }

  return items;
}
