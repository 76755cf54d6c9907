/**
 * Adapter: JsonItemCodec
 *
 * Stores the list as `{ "version": 2, "items": [...] }`.
 *
 * Also reads the v1 layout written by the first release of the tool:
 *   { "list": { "<desc>": { "id", "description", "done" } }, "next_id" }
 * v1 entries are keyed by description, so order comes from `id`.
 * A v1 file is rewritten as v2 on the next save.
 *
 * Dependencies: zod/mini (schema validation).
 */

import { z } from "zod/mini";
import type { Item } from "../../domain/entities/item.ts";
import { TodoError } from "../../domain/entities/errors.ts";
import type { ItemCodec } from "../../domain/ports/item-codec.ts";

export const JSON_STORE_VERSION = 2;

// ============================================================================
// Schemas
// ============================================================================

const StoredItemSchema = z.object({
  index: z.optional(z.number()),
  text: z.string(),
  done: z.optional(z.boolean()),
});

const StoreV2Schema = z.object({
  version: z.literal(JSON_STORE_VERSION),
  items: z.array(StoredItemSchema),
});

const StoreV1Schema = z.object({
  list: z.record(
    z.string(),
    z.object({
      id: z.number(),
      description: z.string(),
      done: z.boolean(),
    }),
  ),
  next_id: z.optional(z.number()),
});

// ============================================================================
// Codec
// ============================================================================

export class JsonItemCodec implements ItemCodec {
  readonly format = "json";

  encode(items: readonly Item[]): string {
    const store = {
      version: JSON_STORE_VERSION,
      items: items.map((item, index) => ({
        index,
        text: item.text,
        done: item.done,
      })),
    };
    return JSON.stringify(store, null, 2) + "\n";
  }

  decode(content: string, source: string): Item[] {
    if (!content.trim()) return [];

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch {
      throw new TodoError("invalid_file", `Invalid JSON in ${source}`);
    }

    const v2 = StoreV2Schema.safeParse(data);
    if (v2.success) {
      return v2.data.items.map((stored, index) => ({
        index,
        text: stored.text,
        done: stored.done ?? false,
      }));
    }

    const v1 = StoreV1Schema.safeParse(data);
    if (v1.success) {
      console.error("Migrating todo file to v2...");
      return Object.values(v1.data.list)
        .sort((a, b) => a.id - b.id)
        .map((entry, index) => ({
          index,
          text: entry.description,
          done: entry.done,
        }));
    }

    const issue = v2.error.issues[0];
    const where = issue && issue.path.length > 0
      ? ` at ${issue.path.map(String).join(".")}`
      : "";
    throw new TodoError(
      "invalid_file",
      `Unrecognized todo file format in ${source}${where}`,
    );
  }
}
