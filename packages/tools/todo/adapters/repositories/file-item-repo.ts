/**
 * Adapter: FileItemRepository
 *
 * Implements the ItemRepository port on top of a single backing file.
 * The codec decides the on-disk format; this class only moves whole
 * lists in and out of the FileSystem.
 *
 * Dependencies:
 *   - FileSystem (port) for file operations
 *   - ItemCodec (port) for serialization
 */

import { dirname } from "node:path";
import type { Item } from "../../domain/entities/item.ts";
import type { FileSystem } from "../../domain/ports/filesystem.ts";
import type { ItemCodec } from "../../domain/ports/item-codec.ts";
import type { ItemRepository } from "../../domain/ports/item-repository.ts";

export class FileItemRepository implements ItemRepository {
  constructor(
    private readonly fs: FileSystem,
    private readonly codec: ItemCodec,
    readonly path: string,
  ) {}

  async load(): Promise<Item[]> {
    if (!(await this.fs.exists(this.path))) {
      return [];
    }
    const content = await this.fs.readFile(this.path);
    return this.codec.decode(content, this.path);
  }

  async save(items: readonly Item[]): Promise<void> {
    const dir = dirname(this.path);
    if (dir !== "." && !(await this.fs.exists(dir))) {
      await this.fs.ensureDir(dir);
    }
    await this.fs.writeFile(this.path, this.codec.encode(items));
  }

  async exists(): Promise<boolean> {
    return await this.fs.exists(this.path);
  }
}
