// Runtime configuration - which file backs the store and in which format

import { z } from "zod/mini";
import { TodoError } from "./domain/entities/errors.ts";
import {
  STORE_FORMATS,
  type StoreFormat,
} from "./domain/ports/item-codec.ts";
import { formatFromPath } from "./adapters/codecs/select-codec.ts";

export const DEFAULT_FILE = "todo_list.json";

const FormatSchema = z.enum(STORE_FORMATS);

export interface ConfigOptions {
  readonly file?: string;
  readonly format?: string;
}

export type Env = Readonly<Record<string, string | undefined>>;

export type TodoConfig = {
  readonly path: string;
  readonly format: StoreFormat;
};

/**
 * Resolve config from CLI options, then TODO_FILE / TODO_FORMAT,
 * then defaults. Without an explicit format the file extension decides.
 */
export function resolveConfig(
  options: ConfigOptions,
  env: Env = process.env,
): TodoConfig {
  const path = options.file || env.TODO_FILE || DEFAULT_FILE;
  const rawFormat = options.format || env.TODO_FORMAT;

  if (!rawFormat) {
    return { path, format: formatFromPath(path) };
  }

  const parsed = FormatSchema.safeParse(rawFormat.trim().toLowerCase());
  if (!parsed.success) {
    throw new TodoError(
      "invalid_args",
      `Unknown format '${rawFormat}' (expected ${STORE_FORMATS.join(" or ")})`,
    );
  }
  return { path, format: parsed.data };
}
