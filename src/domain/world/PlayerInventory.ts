import { CONFIG } from "@/config/config";
import type {
  InventoryAccess,
  ItemSlot,
  Position,
} from "@/shared/types/world";

export interface InventorySlotOptions {
  prefix?: number;
  favorited?: boolean;
}

/**
 * The local player's inventory. Slots 0..HOTBAR_SLOTS-1 form the hotbar.
 */
export class PlayerInventory implements InventoryAccess {
  public readonly slots: ItemSlot[];
  private position: Position;

  constructor(position: Position = { x: 0, y: 0 }, size = CONFIG.INVENTORY_SLOTS) {
    this.slots = new Array<ItemSlot>(size).fill(null);
    this.position = { x: position.x, y: position.y };
  }

  public getPosition(): Position {
    return { x: this.position.x, y: this.position.y };
  }

  public moveTo(position: Position): void {
    this.position = { x: position.x, y: position.y };
  }

  public setSlot(
    index: number,
    itemId: string,
    stack: number,
    options: InventorySlotOptions = {},
  ): boolean {
    if (!Number.isInteger(index) || index < 0 || index >= this.slots.length) {
      return false;
    }
    this.slots[index] =
      stack > 0
        ? {
            itemId,
            stack,
            prefix: options.prefix ?? 0,
            favorited: options.favorited ?? false,
          }
        : null;
    return true;
  }

  public clearSlot(index: number): void {
    if (index >= 0 && index < this.slots.length) this.slots[index] = null;
  }

  public countOf(itemId: string): number {
    let total = 0;
    for (const slot of this.slots) {
      if (slot && slot.itemId === itemId) total += slot.stack;
    }
    return total;
  }
}
