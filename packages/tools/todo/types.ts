// Todo types - re-exports from the domain layer

export type { Item } from "./domain/entities/item.ts";
export { TodoError, type TodoErrorCode } from "./domain/entities/errors.ts";
export {
  describeSelector,
  parseSelector,
  type Selector,
} from "./domain/entities/selector.ts";
export {
  createItem,
  findItemPosition,
  renumber,
} from "./domain/entities/item-helpers.ts";
export type {
  AddOutput,
  RemoveOutput,
  ShowOutput,
  UpdateOutput,
} from "./domain/entities/outputs.ts";
export type { FileSystem } from "./domain/ports/filesystem.ts";
export {
  type ItemCodec,
  STORE_FORMATS,
  type StoreFormat,
} from "./domain/ports/item-codec.ts";
export type { ItemRepository } from "./domain/ports/item-repository.ts";
