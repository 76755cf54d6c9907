// Command output types - immutable result types for all todo commands

import type { Item } from "./item.ts";

export type ShowOutput = {
  readonly items: readonly Item[];
};

export type AddOutput = {
  readonly item: Item;
};

export type RemoveOutput = {
  readonly removed: Item;
};

export type UpdateOutput = {
  readonly change: "text" | "done";
  readonly before: Item;
  readonly after: Item;
};
