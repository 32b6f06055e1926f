/**
 * Top-N item selection
 */

import type { RawItem } from "../sources/types.js";

/**
 * Select the top `n` items, newest first by `sortKey`.
 *
 * Values compare as plain strings (ISO dates order correctly). Items missing
 * the key, or holding null, sort as "" and land last. If any present value is
 * not a string the input order is kept. Sorting is stable, so ties keep their
 * input order.
 */
export function selectTop<T extends RawItem>(items: readonly T[], n: number, sortKey = "date"): T[] {
  if (items.length === 0 || n <= 0) {
    return [];
  }

  const keyed: Array<{ item: T; key: string }> = [];
  for (const item of items) {
    const value = item[sortKey] ?? "";
    if (typeof value !== "string") {
      return items.slice(0, n);
    }
    keyed.push({ item, key: value });
  }

  keyed.sort((a, b) => (a.key < b.key ? 1 : a.key > b.key ? -1 : 0));

  return keyed.slice(0, n).map((entry) => entry.item);
}
