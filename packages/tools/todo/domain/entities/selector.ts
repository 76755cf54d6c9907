// Selector entity - user input identifying an item

export type Selector =
  | { readonly kind: "index"; readonly index: number }
  | { readonly kind: "text"; readonly text: string };

/**
 * Parse raw user input into a selector.
 * Digits only (after trimming) select by position, anything else by text.
 */
export function parseSelector(raw: string): Selector {
  const trimmed = raw.trim();
  if (/^\d+$/.test(trimmed)) {
    return { kind: "index", index: Number.parseInt(trimmed, 10) };
  }
  return { kind: "text", text: trimmed };
}

export function describeSelector(selector: Selector): string {
  return selector.kind === "index"
    ? `index ${selector.index}`
    : `text "${selector.text}"`;
}
