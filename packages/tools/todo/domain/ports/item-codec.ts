// Item codec port - serialization of the item list to a file format

import type { Item } from "../entities/item.ts";

export type StoreFormat = "json" | "csv";

export const STORE_FORMATS = ["json", "csv"] as const;

/**
 * Converts the whole item list to and from file content.
 * The repository picks a codec; use cases never see one.
 */
export interface ItemCodec {
  readonly format: StoreFormat;

  /** Serialize items. Stored indexes follow list position. */
  encode(items: readonly Item[]): string;

  /**
   * Parse file content. Indexes are recomputed from position.
   * Throws TodoError("invalid_file") on malformed content; `source`
   * names the file in the message.
   */
  decode(content: string, source: string): Item[];
}
