import type { Position } from "./world";
import type { NetworkErrorCode } from "../constants/NetworkEnums";

/**
 * Where a snapshot was read from.
 */
export type ItemSource =
  | { readonly kind: "storage"; readonly position: Readonly<Position>; readonly slot: number }
  | { readonly kind: "inventory"; readonly slot: number };

/**
 * Detached, frozen copy of a stack for display.
 */
export interface ItemSnapshot {
  readonly itemId: string;
  readonly stack: number;
  readonly prefix: number;
  readonly name: string;
  readonly maxStack: number;
  readonly favorited: boolean;
  readonly source: ItemSource;
}

/**
 * Read-only material counts split by origin.
 */
export interface MaterialView {
  readonly storage: ReadonlyMap<string, number>;
  readonly inventory: ReadonlyMap<string, number>;
}

export interface QuickStackTransfer {
  readonly itemId: string;
  readonly stack: number;
  readonly fromSlot: number;
  readonly destination: Readonly<Position>;
}

export interface RegisteredContainerInfo {
  readonly position: Readonly<Position>;
  readonly itemCount: number;
  readonly usedSlots: number;
  readonly totalSlots: number;
  readonly inRange: boolean;
}

export interface StorageNetworkResult {
  readonly hasRoot: boolean;
  readonly rootPosition: Readonly<Position> | null;
  /** Unit anchors of the component, row-major */
  readonly unitPositions: readonly Readonly<Position>[];
  readonly unitCount: number;
  readonly nodeCount: number;
}

export interface NetworkResolution {
  readonly success: boolean;
  readonly result: StorageNetworkResult;
  readonly error?: NetworkErrorCode;
  readonly message?: string;
}

export interface TemporaryScopeOptions {
  /** Queue no membership events; for read-only work inside the scope */
  readonly quiet?: boolean;
}

/**
 * Scoped override of provider membership. `restore` is idempotent.
 */
export interface TemporaryMembershipScope {
  readonly positions: readonly Readonly<Position>[];
  readonly isActive: boolean;
  restore(): void;
}

export interface SimulatedCraft {
  readonly withdrawals: readonly { readonly itemId: string; readonly amount: number }[];
  readonly output: { readonly itemId: string; readonly amount: number };
}

/**
 * Result of replaying crafts on copied slots. `capacity` is the room left
 * for the failing craft's output once its own ingredients are gone.
 */
export type CraftSimulation =
  | { readonly fits: true }
  | { readonly fits: false; readonly index: number; readonly capacity: number };
