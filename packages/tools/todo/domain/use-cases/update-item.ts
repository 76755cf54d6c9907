// UpdateItemUseCase - Rewrite or toggle the first item matching a selector

import type { Item } from "../entities/item.ts";
import type { UpdateOutput } from "../entities/outputs.ts";
import { TodoError } from "../entities/errors.ts";
import { findItemPosition } from "../entities/item-helpers.ts";
import { describeSelector, type Selector } from "../entities/selector.ts";
import type { ItemRepository } from "../ports/item-repository.ts";

export interface UpdateItemInput {
  readonly selector: Selector;
  /** Replacement text. When absent the item's done flag is toggled. */
  readonly text?: string;
}

export class UpdateItemUseCase {
  constructor(private readonly itemRepo: ItemRepository) {}

  async execute(input: UpdateItemInput): Promise<UpdateOutput> {
    const newText = input.text?.trim();
    if (input.text !== undefined && !newText) {
      throw new TodoError("invalid_args", "Item text must not be empty");
    }

    const items = await this.itemRepo.load();
    const position = findItemPosition(items, input.selector);

    if (position === -1) {
      throw new TodoError(
        "not_found",
        `No item found with ${describeSelector(input.selector)}`,
      );
    }

    const before = items[position];
    const after: Item = newText
      ? { ...before, text: newText }
      : { ...before, done: !before.done };

    const updated = [...items];
    updated[position] = after;
    await this.itemRepo.save(updated);

    return { change: newText ? "text" : "done", before, after };
  }
}
