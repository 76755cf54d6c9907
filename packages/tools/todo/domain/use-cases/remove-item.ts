// RemoveItemUseCase - Delete the first item matching a selector

import type { RemoveOutput } from "../entities/outputs.ts";
import { TodoError } from "../entities/errors.ts";
import { findItemPosition, renumber } from "../entities/item-helpers.ts";
import { describeSelector, type Selector } from "../entities/selector.ts";
import type { ItemRepository } from "../ports/item-repository.ts";

export interface RemoveItemInput {
  readonly selector: Selector;
}

export class RemoveItemUseCase {
  constructor(private readonly itemRepo: ItemRepository) {}

  async execute(input: RemoveItemInput): Promise<RemoveOutput> {
    const items = await this.itemRepo.load();
    const position = findItemPosition(items, input.selector);

    if (position === -1) {
      throw new TodoError(
        "not_found",
        `No item found with ${describeSelector(input.selector)}`,
      );
    }

    const removed = items[position];
    // Items after the removed one shift down by one
    const remaining = renumber([
      ...items.slice(0, position),
      ...items.slice(position + 1),
    ]);
    await this.itemRepo.save(remaining);

    return { removed };
  }
}
