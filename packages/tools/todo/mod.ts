// Main module exports for todo

import { NodeFileSystem } from "./adapters/filesystem/node-fs.ts";
import { createCodec } from "./adapters/codecs/select-codec.ts";
import { FileItemRepository } from "./adapters/repositories/file-item-repo.ts";
import { type ConfigOptions, type Env, resolveConfig } from "./config.ts";

// ============================================================================
// Domain entities and ports
// ============================================================================

export * from "./types.ts";

// ============================================================================
// Use cases
// ============================================================================

export { ShowItemsUseCase } from "./domain/use-cases/show-items.ts";
export {
  type AddItemInput,
  AddItemUseCase,
} from "./domain/use-cases/add-item.ts";
export {
  type RemoveItemInput,
  RemoveItemUseCase,
} from "./domain/use-cases/remove-item.ts";
export {
  type UpdateItemInput,
  UpdateItemUseCase,
} from "./domain/use-cases/update-item.ts";

// ============================================================================
// Adapters
// ============================================================================

export { NodeFileSystem } from "./adapters/filesystem/node-fs.ts";
export { InMemoryFileSystem } from "./adapters/filesystem/in-memory-fs.ts";
export { JsonItemCodec } from "./adapters/codecs/json-codec.ts";
export { CsvItemCodec } from "./adapters/codecs/csv-codec.ts";
export { createCodec, formatFromPath } from "./adapters/codecs/select-codec.ts";
export { FileItemRepository } from "./adapters/repositories/file-item-repo.ts";

// ============================================================================
// Configuration
// ============================================================================

export {
  type ConfigOptions,
  DEFAULT_FILE,
  type Env,
  resolveConfig,
  type TodoConfig,
} from "./config.ts";

/**
 * Open the file-backed store the CLI would use for these options.
 *
 * @example
 * ```ts
 * const repo = openItemStore({ file: "tasks.csv" });
 * const { item } = await new AddItemUseCase(repo).execute({ text: "buy milk" });
 * ```
 */
export function openItemStore(
  options: ConfigOptions = {},
  env?: Env,
): FileItemRepository {
  const config = resolveConfig(options, env);
  return new FileItemRepository(
    new NodeFileSystem(),
    createCodec(config.format),
    config.path,
  );
}
