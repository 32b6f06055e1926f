/**
 * Tests for top-N item selection
 */

import { describe, it, expect } from "vitest";
import { selectTop } from "./selector.js";

describe("selectTop", () => {
  const items = [
    { title: "a", date: "2026-01-01" },
    { title: "b", date: "2026-01-15" },
    { title: "c", date: "2026-01-10" },
    { title: "d", date: "2025-12-31" },
  ];

  it("returns the newest items first", () => {
    expect(selectTop(items, 3).map((item) => item.title)).toEqual(["b", "c", "a"]);
  });

  it("returns every item when n exceeds the input", () => {
    expect(selectTop(items, 10)).toHaveLength(4);
  });

  it("returns an empty list for empty input", () => {
    expect(selectTop([], 5)).toEqual([]);
  });

  it("returns an empty list when n is zero or negative", () => {
    expect(selectTop(items, 0)).toEqual([]);
    expect(selectTop(items, -2)).toEqual([]);
  });

  it("keeps input order when no item has the sort key", () => {
    const undated = [{ title: "x" }, { title: "y" }, { title: "z" }];
    expect(selectTop(undated, 2).map((item) => item.title)).toEqual(["x", "y"]);
  });

  it("sorts items missing the key last", () => {
    const mixed = [{ title: "x" }, { title: "y", date: "2026-01-02" }, { title: "z", date: "2026-01-05" }];
    expect(selectTop(mixed, 3).map((item) => item.title)).toEqual(["z", "y", "x"]);
  });

  it("treats a null value like a missing one", () => {
    const mixed = [{ title: "x", date: null }, { title: "y", date: "2026-01-02" }];
    expect(selectTop(mixed, 2).map((item) => item.title)).toEqual(["y", "x"]);
  });

  it("keeps input order when values have mixed types", () => {
    const mixed = [
      { title: "x", date: "2026-01-01" },
      { title: "y", date: 20260105 },
      { title: "z", date: "2026-01-09" },
    ];
    expect(selectTop(mixed, 2).map((item) => item.title)).toEqual(["x", "y"]);
  });

  it("keeps ties in input order", () => {
    const tied = [
      { title: "first", date: "2026-01-01" },
      { title: "second", date: "2026-01-01" },
      { title: "third", date: "2026-01-02" },
    ];
    expect(selectTop(tied, 3).map((item) => item.title)).toEqual(["third", "first", "second"]);
  });

  it("sorts by a custom key", () => {
    const ranked = [
      { title: "low", rank: "a" },
      { title: "high", rank: "c" },
      { title: "mid", rank: "b" },
    ];
    expect(selectTop(ranked, 2, "rank").map((item) => item.title)).toEqual(["high", "mid"]);
  });

  it("does not modify the input", () => {
    const copy = [...items];
    selectTop(items, 2);
    expect(items).toEqual(copy);
  });
});
