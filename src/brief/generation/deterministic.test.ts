/**
 * Tests for the deterministic template backend
 */

import { describe, it, expect } from "vitest";
import {
  DeterministicBackend,
  TEMPLATE_LIMITATIONS,
  TEMPLATE_RISKS,
  buildTemplateSections,
} from "./deterministic.js";
import type { GenerationContext } from "./types.js";

function context(overrides: Partial<GenerationContext> = {}): GenerationContext {
  return { ticker: "ACME", date: "2026-01-18", irReleases: [], news: [], ...overrides };
}

function items(count: number, prefix: string): Array<Record<string, unknown>> {
  return Array.from({ length: count }, (_, i) => ({
    title: `${prefix} ${i + 1}`,
    source: `Source ${i % 2}`,
    date: `2026-01-${String(i + 1).padStart(2, "0")}`,
  }));
}

describe("buildTemplateSections", () => {
  it("builds sections from titles, counts and sources", () => {
    const sections = buildTemplateSections(
      context({
        irReleases: [{ title: "Q4 results published" }],
        news: [
          { title: "Acme wins contract", source: "Wire" },
          { title: "Acme opens plant", source: "Wire" },
        ],
      }),
    );

    expect(sections.summary_bullets).toEqual([
      "News: Acme wins contract...",
      "Found 2 news items about ACME.",
      "Sources: Wire",
      "ACME released 1 IR announcements in the review period.",
      "Key release: Q4 results published",
    ]);
    expect(sections.drivers).toEqual([
      "News driver: Acme wins contract",
      "News driver: Acme opens plant",
      "More details are available on the company's investor relations pages.",
    ]);
    expect(sections.risks).toEqual([...TEMPLATE_RISKS]);
    expect(sections.limitations).toEqual([...TEMPLATE_LIMITATIONS]);
  });

  it("pads an empty context with filler bullets", () => {
    const sections = buildTemplateSections(context());

    expect(sections.summary_bullets).toEqual([
      "Analysis is based on public news about ACME.",
      "Analysis is based on public news about ACME.",
      "Analysis is based on public news about ACME.",
    ]);
    expect(sections.drivers).toHaveLength(3);
    expect(sections.risks).toHaveLength(3);
    expect(sections.limitations).toHaveLength(3);
  });

  it("truncates long titles", () => {
    const long = "x".repeat(150);
    const sections = buildTemplateSections(
      context({ irReleases: [{ title: long }], news: [{ title: long }] }),
    );

    expect(sections.summary_bullets[0]).toBe(`News: ${"x".repeat(100)}...`);
    expect(sections.summary_bullets).toContain(`Key release: ${"x".repeat(80)}`);
    expect(sections.drivers[0]).toBe(`News driver: ${"x".repeat(80)}`);
  });

  it("skips titles that are missing or not text", () => {
    const sections = buildTemplateSections(
      context({ news: [{ source: "Wire" }, { title: 42 }, { title: ["nested"] }] }),
    );

    expect(sections.summary_bullets).toEqual([
      "Found 3 news items about ACME.",
      "Sources: Wire",
      "Analysis is based on public news about ACME.",
    ]);
    expect(sections.drivers).toEqual([
      "News driver: 42",
      "More details are available on the company's investor relations pages.",
      "More details are available on the company's investor relations pages.",
    ]);
  });

  it("lists each source of the first three news items once", () => {
    const sections = buildTemplateSections(context({ news: items(5, "Story") }));
    expect(sections.summary_bullets).toContain("Sources: Source 0, Source 1");
  });

  it("stays within section bounds for any input size", () => {
    for (const count of [0, 1, 2, 3, 10, 50]) {
      const sections = buildTemplateSections(
        context({ irReleases: items(count, "Release"), news: items(count, "Story") }),
      );

      expect(sections.summary_bullets.length).toBeGreaterThanOrEqual(3);
      expect(sections.summary_bullets.length).toBeLessThanOrEqual(6);
      expect(sections.drivers.length).toBeGreaterThanOrEqual(1);
      expect(sections.drivers.length).toBeLessThanOrEqual(3);
      expect(sections.risks).toHaveLength(3);
      expect(sections.limitations).toHaveLength(3);
    }
  });

  it("returns identical output for identical input", () => {
    const input = context({ irReleases: items(2, "Release"), news: items(4, "Story") });
    expect(buildTemplateSections(input)).toEqual(buildTemplateSections(input));
  });

  it("returns fresh arrays on every call", () => {
    const first = buildTemplateSections(context());
    first.risks.push("mutated");
    expect(buildTemplateSections(context()).risks).toEqual([...TEMPLATE_RISKS]);
  });
});

describe("DeterministicBackend", () => {
  it("serves demo mode", () => {
    expect(new DeterministicBackend().mode).toBe("demo");
  });

  it("answers prompts with a fixed response", async () => {
    const response = await new DeterministicBackend().generate("hello world");
    expect(response).toBe("[Demo Response] Processed prompt with 11 characters.");
  });

  it("generates the template sections", async () => {
    const input = context({ news: items(2, "Story") });
    await expect(new DeterministicBackend().generateSections(input)).resolves.toEqual(
      buildTemplateSections(input),
    );
  });
});
