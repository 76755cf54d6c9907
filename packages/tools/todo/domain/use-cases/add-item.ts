// AddItemUseCase - Append an item to the store

import type { AddOutput } from "../entities/outputs.ts";
import { TodoError } from "../entities/errors.ts";
import { createItem } from "../entities/item-helpers.ts";
import type { ItemRepository } from "../ports/item-repository.ts";

export interface AddItemInput {
  readonly text: string;
}

export class AddItemUseCase {
  constructor(private readonly itemRepo: ItemRepository) {}

  async execute(input: AddItemInput): Promise<AddOutput> {
    const text = input.text.trim();
    if (!text) {
      throw new TodoError("invalid_args", "Item text must not be empty");
    }

    const items = await this.itemRepo.load();
    const item = createItem(items.length, text);
    await this.itemRepo.save([...items, item]);

    return { item };
  }
}
