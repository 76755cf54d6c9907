// ShowItemsUseCase - List every item in order

import type { ShowOutput } from "../entities/outputs.ts";
import type { ItemRepository } from "../ports/item-repository.ts";

export class ShowItemsUseCase {
  constructor(private readonly itemRepo: ItemRepository) {}

  async execute(): Promise<ShowOutput> {
    const items = await this.itemRepo.load();
    return { items };
  }
}
