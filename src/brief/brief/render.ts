/**
 * Markdown rendering for briefs
 */

import type { Brief } from "./schema.js";

/** IR releases shown in the report */
export const REPORT_IR_LIMIT = 3;

/** News items shown in the report */
export const REPORT_NEWS_LIMIT = 5;

function bulletList(items: string[]): string[] {
  return items.map((item) => `- ${item}`);
}

/**
 * Render a brief as a markdown report
 */
export function renderMarkdown(brief: Brief): string {
  const lines: string[] = [
    `# Company Brief: ${brief.ticker}`,
    `**Date:** ${brief.date}`,
    "",
    "## Summary",
    ...bulletList(brief.summary_bullets),
    "",
    "## Company Profile",
    `- **Ticker:** ${brief.ticker}`,
    `- **Date:** ${brief.date}`,
    "",
    "## IR Releases",
  ];

  if (brief.ir_releases.length > 0) {
    for (const ir of brief.ir_releases.slice(0, REPORT_IR_LIMIT)) {
      lines.push(`### ${ir.title}`);
      lines.push(`- **Date:** ${ir.date}`);
      lines.push(`- **Source:** ${ir.source}`);
      if (ir.summary) {
        lines.push(`- ${ir.summary}`);
      }
      lines.push(`- [Link](${ir.url})`);
      lines.push("");
    }
  } else {
    lines.push("*No IR releases available.*");
    lines.push("");
  }

  lines.push("## News");
  if (brief.news.length > 0) {
    for (const item of brief.news.slice(0, REPORT_NEWS_LIMIT)) {
      lines.push(`### ${item.title}`);
      lines.push(`- **Source:** ${item.source}`);
      if (item.summary) {
        lines.push(`- ${item.summary}`);
      }
      lines.push(`- [Link](${item.url})`);
      lines.push("");
    }
  } else {
    lines.push("*No news available.*");
    lines.push("");
  }

  lines.push(
    "## Drivers",
    ...bulletList(brief.drivers),
    "",
    "## Risks",
    ...bulletList(brief.risks),
    "",
    "## Notes and Limitations",
    ...bulletList(brief.limitations),
    "",
    "---",
    "*Generated by the IR & News Brief Agent*",
  );

  return lines.join("\n");
}
