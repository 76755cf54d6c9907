// Item entity - a single to-do record

/**
 * Immutable to-do item.
 * `index` mirrors the item's position in the store and is recomputed
 * whenever the list is loaded or changed.
 */
export type Item = {
  readonly index: number; // zero-based list position
  readonly text: string;
  readonly done: boolean;
};
