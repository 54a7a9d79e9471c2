import { CONFIG } from "@/config/config";
import type { ItemCatalogAccess } from "@/shared/types/world";

export interface ItemDefinition {
  id: string;
  name: string;
  maxStack: number;
}

/**
 * Item names and stack limits. Unknown items stack to DEFAULT_MAX_STACK.
 */
export class ItemCatalog implements ItemCatalogAccess {
  private readonly items = new Map<string, ItemDefinition>();

  constructor(definitions: readonly ItemDefinition[] = []) {
    for (const definition of definitions) {
      this.items.set(definition.id, { ...definition });
    }
  }

  public getName(itemId: string): string {
    return this.items.get(itemId)?.name ?? itemId;
  }

  public getMaxStack(itemId: string): number {
    const maxStack = this.items.get(itemId)?.maxStack;
    return maxStack && maxStack > 0 ? maxStack : CONFIG.DEFAULT_MAX_STACK;
  }

  public has(itemId: string): boolean {
    return this.items.has(itemId);
  }

  public size(): number {
    return this.items.size;
  }
}
