/**
 * Tests for RSS item extraction
 */

import { describe, it, expect } from "vitest";
import { decodeEntities, parseRssItems, toIsoDate } from "./rss.js";

const FEED = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
  <channel>
    <title>Headlines</title>
    <item>
      <title><![CDATA[Acme & Co. beats estimates]]></title>
      <link>https://example.com/a</link>
      <pubDate>Fri, 16 Jan 2026 14:30:00 GMT</pubDate>
      <description>Quarterly sales rose &amp; margins widened.</description>
    </item>
    <item>
      <title>Acme &quot;Next&quot; launch</title>
      <link>https://example.com/b</link>
      <source url="https://wire.example.com">Example Wire</source>
    </item>
    <item>
      <title>No link here</title>
    </item>
    <item>
      <title>Bad date</title>
      <link>https://example.com/c</link>
      <pubDate>sometime last week</pubDate>
    </item>
  </channel>
</rss>`;

describe("parseRssItems", () => {
  it("extracts items and skips those without a link", () => {
    expect(parseRssItems(FEED)).toEqual([
      {
        title: "Acme & Co. beats estimates",
        url: "https://example.com/a",
        date: "2026-01-16",
        summary: "Quarterly sales rose & margins widened.",
      },
      {
        title: 'Acme "Next" launch',
        url: "https://example.com/b",
        date: "",
        source: "Example Wire",
      },
      {
        title: "Bad date",
        url: "https://example.com/c",
        date: "",
      },
    ]);
  });

  it("stops at the limit", () => {
    expect(parseRssItems(FEED, 1)).toHaveLength(1);
  });

  it("returns nothing for a document without items", () => {
    expect(parseRssItems("<rss><channel></channel></rss>")).toEqual([]);
  });
});

describe("toIsoDate", () => {
  it("converts RFC 822 dates", () => {
    expect(toIsoDate("Sat, 17 Jan 2026 08:00:00 +0000")).toBe("2026-01-17");
  });

  it("returns an empty string for missing or invalid dates", () => {
    expect(toIsoDate(undefined)).toBe("");
    expect(toIsoDate("not a date")).toBe("");
  });
});

describe("decodeEntities", () => {
  it("decodes named and numeric entities", () => {
    expect(decodeEntities("a &lt;b&gt; &#39;c&#39; &#x41; &nbsp;")).toBe("a <b> 'c' A &nbsp;");
  });
});
