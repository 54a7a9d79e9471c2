import { NetworkNodeKind } from "@/shared/constants/NetworkEnums";
import type { ItemContainer, Position } from "@/shared/types/world";
import { ContainerStore } from "./ContainerStore";
import { ItemCatalog, type ItemDefinition } from "./ItemCatalog";
import { PlayerInventory } from "./PlayerInventory";
import { StaticStationSource } from "./StaticStationSource";
import { TileGrid } from "./TileGrid";

/**
 * In-memory reference host: the tile grid, the containers behind unit tiles,
 * the player inventory, the item catalog and the station source.
 */
export class SandboxWorld {
  public readonly tiles = new TileGrid();
  public readonly containers = new ContainerStore();
  public readonly inventory: PlayerInventory;
  public readonly items: ItemCatalog;
  public readonly stations = new StaticStationSource();

  constructor(
    items: readonly ItemDefinition[] = [],
    playerPosition: Position = { x: 0, y: 0 },
  ) {
    this.items = new ItemCatalog(items);
    this.inventory = new PlayerInventory(playerPosition);
  }

  public placeRoot(x: number, y: number, width = 1, height = 1): boolean {
    return this.tiles.place(NetworkNodeKind.ROOT, x, y, width, height);
  }

  /**
   * Places a storage unit and the container behind it.
   */
  public placeUnit(
    x: number,
    y: number,
    options: { width?: number; height?: number; slots?: number } = {},
  ): ItemContainer | undefined {
    const placed = this.tiles.place(
      NetworkNodeKind.UNIT,
      x,
      y,
      options.width ?? 1,
      options.height ?? 1,
    );
    if (!placed) return undefined;
    return this.containers.create({ x, y }, options.slots);
  }

  public placeComponent(x: number, y: number, width = 1, height = 1): boolean {
    return this.tiles.place(NetworkNodeKind.COMPONENT, x, y, width, height);
  }

  public placeConnector(x: number, y: number): boolean {
    return this.tiles.place(NetworkNodeKind.CONNECTOR, x, y);
  }

  public placeAccess(x: number, y: number, width = 1, height = 1): boolean {
    return this.tiles.place(NetworkNodeKind.ACCESS, x, y, width, height);
  }

  /**
   * Removes the node covering (x, y). A unit that still holds items stays.
   */
  public removeNode(x: number, y: number): boolean {
    const tile = this.tiles.getNetworkTile(x, y);
    if (!tile) return false;

    if (tile.kind === NetworkNodeKind.UNIT) {
      const container = this.containers.getContainerAt(tile.anchor);
      if (container && container.slots.some((slot) => slot !== null)) {
        return false;
      }
      this.containers.remove(tile.anchor);
    }
    return this.tiles.remove(x, y) !== undefined;
  }

  /**
   * Fills the first empty slots of the unit at `position`.
   */
  public stock(position: Position, itemId: string, amount: number): number {
    const container = this.containers.getContainerAt(position);
    if (!container) return 0;

    const maxStack = this.items.getMaxStack(itemId);
    let remaining = amount;
    for (let i = 0; i < container.slots.length && remaining > 0; i++) {
      if (container.slots[i] !== null) continue;
      const stack = Math.min(remaining, maxStack);
      container.slots[i] = { itemId, stack, prefix: 0 };
      remaining -= stack;
    }
    return amount - remaining;
  }

  public countInContainer(position: Position, itemId: string): number {
    const container = this.containers.getContainerAt(position);
    if (!container) return 0;
    let total = 0;
    for (const slot of container.slots) {
      if (slot && slot.itemId === itemId) total += slot.stack;
    }
    return total;
  }
}
