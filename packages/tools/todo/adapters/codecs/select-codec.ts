// Codec selection by format name or file extension

import { extname } from "node:path";
import type { ItemCodec, StoreFormat } from "../../domain/ports/item-codec.ts";
import { CsvItemCodec } from "./csv-codec.ts";
import { JsonItemCodec } from "./json-codec.ts";

export function formatFromPath(path: string): StoreFormat {
  return extname(path).toLowerCase() === ".csv" ? "csv" : "json";
}

export function createCodec(format: StoreFormat): ItemCodec {
  switch (format) {
    case "csv":
      return new CsvItemCodec();
    case "json":
      return new JsonItemCodec();
  }
}
