import { CONFIG } from "@/config/config";
import type {
  ContainerAccess,
  ItemContainer,
  ItemStack,
  Position,
} from "@/shared/types/world";
import { toKey } from "@/shared/utils/PositionUtils";

export class ContainerStore implements ContainerAccess {
  private readonly containers = new Map<string, ItemContainer>();

  public create(
    position: Position,
    size: number = CONFIG.CONTAINER_SLOTS,
  ): ItemContainer {
    const existing = this.containers.get(toKey(position));
    if (existing) return existing;

    const container: ItemContainer = {
      position: Object.freeze({ x: position.x, y: position.y }),
      slots: new Array<ItemStack | null>(Math.max(1, size)).fill(null),
    };
    this.containers.set(toKey(position), container);
    return container;
  }

  public remove(position: Position): boolean {
    return this.containers.delete(toKey(position));
  }

  public getContainerAt(position: Position): ItemContainer | undefined {
    return this.containers.get(toKey(position));
  }

  public has(position: Position): boolean {
    return this.containers.has(toKey(position));
  }

  public getAll(): ItemContainer[] {
    return [...this.containers.values()];
  }

  /**
   * Writes a stack into a slot, replacing whatever was there.
   */
  public put(
    position: Position,
    slot: number,
    itemId: string,
    stack: number,
    prefix = 0,
  ): boolean {
    const container = this.containers.get(toKey(position));
    if (!container || slot < 0 || slot >= container.slots.length) return false;
    container.slots[slot] = stack > 0 ? { itemId, stack, prefix } : null;
    return true;
  }
}
