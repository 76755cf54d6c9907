// Pure helpers over item lists

import type { Item } from "./item.ts";
import type { Selector } from "./selector.ts";

function normalizeText(text: string): string {
  return text.trim().toLowerCase();
}

/** Rebuild indexes from list position. */
export function renumber(items: readonly Item[]): Item[] {
  return items.map((item, index) =>
    item.index === index ? item : { ...item, index }
  );
}

/**
 * Find the position of the first item matching the selector.
 * Text selectors compare case-insensitively on the whole text.
 * Returns -1 when nothing matches.
 */
export function findItemPosition(
  items: readonly Item[],
  selector: Selector,
): number {
  if (selector.kind === "index") {
    return selector.index < items.length ? selector.index : -1;
  }
  const wanted = normalizeText(selector.text);
  return items.findIndex((item) => normalizeText(item.text) === wanted);
}

export function createItem(index: number, text: string): Item {
  return { index, text, done: false };
}
