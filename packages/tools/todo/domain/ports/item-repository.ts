// Item repository port - persistence interface for the item store

import type { Item } from "../entities/item.ts";

/**
 * Repository for loading and saving the whole item list.
 */
export interface ItemRepository {
  /** Location of the backing file, used in messages. */
  readonly path: string;

  /** Load all items in order. Returns an empty list if the file is absent. */
  load(): Promise<Item[]>;

  /** Replace the stored list. */
  save(items: readonly Item[]): Promise<void>;

  /** Check if the backing file exists. */
  exists(): Promise<boolean>;
}
