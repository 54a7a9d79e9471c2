import type { NetworkNodeKind } from "../constants/NetworkEnums";
import type { EnvironmentCondition } from "../constants/CraftingEnums";

/**
 * Integer tile coordinates.
 */
export interface Position {
  x: number;
  y: number;
}

/**
 * A live, mutable stack held in a container or inventory slot.
 * Engine code outside the provider never keeps a reference to one.
 */
export interface ItemStack {
  itemId: string;
  stack: number;
  /** Modifier applied to the item, 0 = none */
  prefix: number;
  favorited?: boolean;
}

export type ItemSlot = ItemStack | null;

export interface ItemContainer {
  readonly position: Position;
  readonly slots: ItemSlot[];
}

/**
 * Network tile as seen by the resolver. Multi-tile objects report the same
 * anchor (top-left cell) and footprint for every cell they cover.
 */
export interface NetworkTile {
  readonly kind: NetworkNodeKind;
  readonly anchor: Position;
  readonly width: number;
  readonly height: number;
}

/**
 * Host seam: read access to the tile grid.
 * The revision counter must change on every tile mutation.
 */
export interface TileLookup {
  getNetworkTile(x: number, y: number): NetworkTile | undefined;
  getRevision(): number;
}

/**
 * Host seam: containers by position.
 */
export interface ContainerAccess {
  getContainerAt(position: Position): ItemContainer | undefined;
}

/**
 * Host seam: the local player's inventory and location.
 */
export interface InventoryAccess {
  readonly slots: ItemSlot[];
  getPosition(): Position;
}

export interface ItemCatalogAccess {
  getName(itemId: string): string;
  getMaxStack(itemId: string): number;
  has(itemId: string): boolean;
}

/**
 * Host seam: what the player is currently standing next to.
 */
export interface StationSource {
  getNearbyStations(): readonly string[];
  getNearbyConditions(): readonly EnvironmentCondition[];
}
