import { inject, injectable } from "inversify";
import { CONFIG } from "@/config/config";
import { TYPES } from "@/config/Types";
import { logger, LogCategory } from "@/infrastructure/utils/logger";
import { StorageEventType } from "@/shared/constants/StorageEventEnums";
import type { SessionSettings } from "@/shared/types/session";
import type {
  CraftSimulation,
  ItemSnapshot,
  MaterialView,
  QuickStackTransfer,
  RegisteredContainerInfo,
  SimulatedCraft,
  TemporaryMembershipScope,
  TemporaryScopeOptions,
} from "@/shared/types/storage";
import type {
  ContainerAccess,
  InventoryAccess,
  ItemCatalogAccess,
  ItemContainer,
  ItemSlot,
  Position,
} from "@/shared/types/world";
import { distanceSquared, toKey } from "@/shared/utils/PositionUtils";
import { getTierRange } from "../session/ProgressionTier";
import { ChestRegistry } from "./ChestRegistry";
import type { IStorageProvider } from "./IStorageProvider";
import { createItemSnapshot } from "./ItemSnapshot";
import { StorageEventBus } from "./StorageEventBus";

type PlacementListener = (position: Readonly<Position>, amount: number) => void;

function isValidCount(count: number): boolean {
  return Number.isInteger(count) && count > 0;
}

function countInSlots(slots: readonly ItemSlot[], itemId: string): number {
  let total = 0;
  for (const slot of slots) {
    if (slot && slot.itemId === itemId) total += slot.stack;
  }
  return total;
}

function addCounts(target: Map<string, number>, slots: readonly ItemSlot[]): void {
  for (const slot of slots) {
    if (slot) target.set(slot.itemId, (target.get(slot.itemId) ?? 0) + slot.stack);
  }
}

function copySlots(slots: readonly ItemSlot[]): ItemSlot[] {
  return slots.map((slot) => (slot ? { ...slot } : null));
}

/**
 * Takes up to `amount` of `itemId`, lowest slot first.
 */
function withdrawFromSlots(slots: ItemSlot[], itemId: string, amount: number): number {
  let remaining = amount;
  for (let i = 0; i < slots.length && remaining > 0; i++) {
    const slot = slots[i];
    if (!slot || slot.itemId !== itemId) continue;
    const take = Math.min(slot.stack, remaining);
    slot.stack -= take;
    remaining -= take;
    if (slot.stack <= 0) slots[i] = null;
  }
  return amount - remaining;
}

/**
 * Provider for the local player: the membership is the registered containers
 * in range of the player, or the positions of an open temporary scope.
 */
@injectable()
export class SingleplayerProvider implements IStorageProvider {
  constructor(
    @inject(TYPES.ContainerAccess) private readonly containers: ContainerAccess,
    @inject(TYPES.InventoryAccess) private readonly inventory: InventoryAccess,
    @inject(TYPES.ItemCatalog) private readonly catalog: ItemCatalogAccess,
    @inject(TYPES.ChestRegistry) private readonly registry: ChestRegistry,
    @inject(TYPES.SessionSettings) private readonly settings: SessionSettings,
    @inject(TYPES.StorageEventBus) private readonly events: StorageEventBus,
  ) {}

  // --- membership ---------------------------------------------------------

  private getMembers(): ItemContainer[] {
    const temporary = this.registry.getTemporaryPositions();
    let positions: readonly Readonly<Position>[];
    if (temporary) {
      positions = temporary;
    } else {
      const center = this.inventory.getPosition();
      const range = getTierRange(this.settings.tier);
      positions = this.registry
        .getPositions()
        .filter((p) => this.isContainerInRange(p, center, range));
    }

    const members: ItemContainer[] = [];
    for (const position of positions) {
      const container = this.containers.getContainerAt(position);
      if (container) members.push(container);
    }
    return members;
  }

  public isContainerInRange(
    position: Position,
    center: Position,
    rangeTiles: number,
  ): boolean {
    if (rangeTiles === Infinity) return true;
    if (!(rangeTiles >= 0)) return false;
    return distanceSquared(position, center) <= rangeTiles * rangeTiles;
  }

  public useTemporaryPositions(
    positions: Iterable<Readonly<Position>>,
    options: TemporaryScopeOptions = {},
  ): TemporaryMembershipScope {
    const quiet = options.quiet ?? false;
    const scope = this.registry.useTemporaryPositions(positions);
    if (!quiet) {
      this.events.queueEvent(StorageEventType.MEMBERSHIP_OVERRIDDEN, {
        positions: scope.positions,
      });
    }
    logger.debug(
      `📦 [STORAGE] Membership narrowed to ${scope.positions.length} position(s)`,
      LogCategory.STORAGE,
    );
    return {
      positions: scope.positions,
      get isActive(): boolean {
        return scope.isActive;
      },
      restore: (): void => {
        if (!scope.isActive) return;
        scope.restore();
        if (quiet) return;
        this.events.queueEvent(StorageEventType.MEMBERSHIP_RESTORED, {
          positions: this.registry.getTemporaryPositions(),
        });
      },
    };
  }

  public withTemporaryPositions<T>(
    positions: Iterable<Readonly<Position>>,
    fn: () => T,
    options: TemporaryScopeOptions = {},
  ): T {
    const scope = this.useTemporaryPositions(positions, options);
    try {
      return fn();
    } finally {
      scope.restore();
    }
  }

  // --- read-only ----------------------------------------------------------

  public getItemCount(itemId: string): number {
    return this.getStorageCount(itemId) + this.getInventoryCount(itemId);
  }

  public getStorageCount(itemId: string): number {
    let total = 0;
    for (const container of this.getMembers()) {
      total += countInSlots(container.slots, itemId);
    }
    return total;
  }

  public getInventoryCount(itemId: string): number {
    return countInSlots(this.inventory.slots, itemId);
  }

  public getAllItems(): ItemSnapshot[] {
    const snapshots: ItemSnapshot[] = [];
    for (const container of this.getMembers()) {
      container.slots.forEach((slot, index) => {
        if (!slot) return;
        snapshots.push(
          createItemSnapshot(slot, this.catalog, {
            kind: "storage",
            position: container.position,
            slot: index,
          }),
        );
      });
    }
    this.inventory.slots.forEach((slot, index) => {
      if (!slot) return;
      snapshots.push(
        createItemSnapshot(slot, this.catalog, { kind: "inventory", slot: index }),
      );
    });
    return snapshots;
  }

  public getMaterialView(): MaterialView {
    const storage = new Map<string, number>();
    for (const container of this.getMembers()) addCounts(storage, container.slots);
    const inventory = new Map<string, number>();
    addCounts(inventory, this.inventory.slots);
    return { storage, inventory };
  }

  /**
   * Snapshots of registered containers within range, ignoring any temporary
   * membership.
   */
  public getItemsInRange(center: Position, rangeTiles: number): ItemSnapshot[] {
    const snapshots: ItemSnapshot[] = [];
    for (const position of this.registry.getPositions()) {
      if (!this.isContainerInRange(position, center, rangeTiles)) continue;
      const container = this.containers.getContainerAt(position);
      if (!container) continue;
      container.slots.forEach((slot, index) => {
        if (!slot) return;
        snapshots.push(
          createItemSnapshot(slot, this.catalog, {
            kind: "storage",
            position: container.position,
            slot: index,
          }),
        );
      });
    }
    return snapshots;
  }

  public getRegisteredContainers(): RegisteredContainerInfo[] {
    const center = this.inventory.getPosition();
    const range = getTierRange(this.settings.tier);
    const infos: RegisteredContainerInfo[] = [];
    for (const position of this.registry.getPositions()) {
      const container = this.containers.getContainerAt(position);
      if (!container) continue;
      let itemCount = 0;
      let usedSlots = 0;
      for (const slot of container.slots) {
        if (!slot) continue;
        itemCount += slot.stack;
        usedSlots++;
      }
      infos.push({
        position,
        itemCount,
        usedSlots,
        totalSlots: container.slots.length,
        inRange: this.isContainerInRange(position, center, range),
      });
    }
    return infos;
  }

  public getStorageCapacity(itemId: string, prefix = 0): number {
    let total = 0;
    for (const container of this.getMembers()) {
      total += this.capacityOf(container.slots, itemId, prefix);
    }
    return total;
  }

  public getInventoryCapacity(itemId: string, prefix = 0): number {
    return this.capacityOf(this.inventory.slots, itemId, prefix);
  }

  private capacityOf(slots: readonly ItemSlot[], itemId: string, prefix: number): number {
    const maxStack = this.catalog.getMaxStack(itemId);
    let total = 0;
    for (const slot of slots) {
      if (!slot) total += maxStack;
      else if (slot.itemId === itemId && slot.prefix === prefix) {
        total += Math.max(0, maxStack - slot.stack);
      }
    }
    return total;
  }

  public simulateCrafts(crafts: readonly SimulatedCraft[]): CraftSimulation {
    const storage: ItemContainer[] = this.getMembers().map((container) => ({
      position: container.position,
      slots: copySlots(container.slots),
    }));
    const inventory: ItemContainer = {
      position: this.inventory.getPosition(),
      slots: copySlots(this.inventory.slots),
    };

    for (let index = 0; index < crafts.length; index++) {
      const { withdrawals, output } = crafts[index];
      for (const withdrawal of withdrawals) {
        let taken = 0;
        for (const container of storage) {
          if (taken >= withdrawal.amount) break;
          taken += withdrawFromSlots(container.slots, withdrawal.itemId, withdrawal.amount - taken);
        }
        if (taken < withdrawal.amount) {
          withdrawFromSlots(inventory.slots, withdrawal.itemId, withdrawal.amount - taken);
        }
      }

      let capacity = this.capacityOf(inventory.slots, output.itemId, 0);
      for (const container of storage) {
        capacity += this.capacityOf(container.slots, output.itemId, 0);
      }
      if (capacity < output.amount) return { fits: false, index, capacity };

      const remainder = this.depositInto(storage, output.itemId, output.amount, 0);
      if (remainder > 0) this.depositInto([inventory], output.itemId, remainder, 0);
    }
    return { fits: true };
  }

  // --- mutation -----------------------------------------------------------

  public tryWithdraw(itemId: string, count: number): number {
    if (!isValidCount(count)) return 0;
    let withdrawn = 0;
    for (const container of this.getMembers()) {
      withdrawn += withdrawFromSlots(container.slots, itemId, count - withdrawn);
      if (withdrawn >= count) break;
    }
    if (withdrawn > 0) {
      this.events.queueEvent(StorageEventType.ITEMS_WITHDRAWN, {
        itemId,
        amount: withdrawn,
        target: "storage",
      });
    }
    return withdrawn;
  }

  public tryWithdrawFromInventory(itemId: string, count: number): number {
    if (!isValidCount(count)) return 0;
    const withdrawn = withdrawFromSlots(this.inventory.slots, itemId, count);
    if (withdrawn > 0) {
      this.events.queueEvent(StorageEventType.ITEMS_WITHDRAWN, {
        itemId,
        amount: withdrawn,
        target: "inventory",
      });
    }
    return withdrawn;
  }

  public tryDeposit(itemId: string, count: number, prefix = 0): number {
    if (!isValidCount(count)) return count > 0 ? count : 0;
    const remainder = this.depositInto(this.getMembers(), itemId, count, prefix);
    if (remainder < count) {
      this.events.queueEvent(StorageEventType.ITEMS_DEPOSITED, {
        itemId,
        amount: count - remainder,
        target: "storage",
      });
    }
    return remainder;
  }

  public tryDepositToInventory(itemId: string, count: number, prefix = 0): number {
    if (!isValidCount(count)) return count > 0 ? count : 0;
    const target: ItemContainer = {
      position: this.inventory.getPosition(),
      slots: this.inventory.slots,
    };
    const remainder = this.depositInto([target], itemId, count, prefix);
    if (remainder < count) {
      this.events.queueEvent(StorageEventType.ITEMS_DEPOSITED, {
        itemId,
        amount: count - remainder,
        target: "inventory",
      });
    }
    return remainder;
  }

  /**
   * Two passes over the targets: top up matching stacks, then fill empty slots.
   */
  private depositInto(
    targets: readonly ItemContainer[],
    itemId: string,
    count: number,
    prefix: number,
    onPlaced?: PlacementListener,
  ): number {
    const maxStack = this.catalog.getMaxStack(itemId);
    let remaining = count;

    for (const target of targets) {
      for (const slot of target.slots) {
        if (remaining <= 0) return 0;
        if (!slot || slot.itemId !== itemId || slot.prefix !== prefix) continue;
        const space = maxStack - slot.stack;
        if (space <= 0) continue;
        const add = Math.min(space, remaining);
        slot.stack += add;
        remaining -= add;
        onPlaced?.(target.position, add);
      }
    }

    for (const target of targets) {
      for (let i = 0; i < target.slots.length; i++) {
        if (remaining <= 0) return 0;
        if (target.slots[i] !== null) continue;
        const add = Math.min(maxStack, remaining);
        target.slots[i] = { itemId, stack: add, prefix };
        remaining -= add;
        onPlaced?.(target.position, add);
      }
    }

    return remaining;
  }

  public depositFromInventorySlot(slot: number, singleItemOnly: boolean): number {
    if (!Number.isInteger(slot) || slot < 0 || slot >= this.inventory.slots.length) {
      return 0;
    }
    const item = this.inventory.slots[slot];
    if (!item) return 0;

    const amount = singleItemOnly ? 1 : item.stack;
    const remainder = this.tryDeposit(item.itemId, amount, item.prefix);
    const moved = amount - remainder;
    item.stack -= moved;
    if (item.stack <= 0) this.inventory.slots[slot] = null;
    return moved;
  }

  /**
   * Moves inventory stacks whose item type already sits in storage.
   * Hotbar slots and favorited items are skipped unless included.
   */
  public quickStackInventory(
    includeHotbar: boolean,
    includeFavorited: boolean,
    outTransfers?: QuickStackTransfer[],
  ): number {
    const members = this.getMembers();
    if (members.length === 0) return 0;

    const storedTypes = new Set<string>();
    for (const container of members) {
      for (const slot of container.slots) if (slot) storedTypes.add(slot.itemId);
    }

    const start = includeHotbar ? 0 : CONFIG.HOTBAR_SLOTS;
    let total = 0;
    let transferCount = 0;

    for (let index = start; index < this.inventory.slots.length; index++) {
      const item = this.inventory.slots[index];
      if (!item || !storedTypes.has(item.itemId)) continue;
      if (item.favorited && !includeFavorited) continue;

      const placements = new Map<string, { position: Readonly<Position>; amount: number }>();
      const remainder = this.depositInto(
        members,
        item.itemId,
        item.stack,
        item.prefix,
        (position, amount) => {
          const key = toKey(position);
          const existing = placements.get(key);
          if (existing) existing.amount += amount;
          else placements.set(key, { position, amount });
        },
      );

      const moved = item.stack - remainder;
      if (moved <= 0) continue;

      for (const placement of placements.values()) {
        transferCount++;
        outTransfers?.push({
          itemId: item.itemId,
          stack: placement.amount,
          fromSlot: index,
          destination: placement.position,
        });
      }
      total += moved;
      item.stack = remainder;
      if (item.stack <= 0) this.inventory.slots[index] = null;
    }

    if (total > 0) {
      this.events.queueEvent(StorageEventType.QUICK_STACK_COMPLETED, {
        moved: total,
        transfers: transferCount,
      });
      logger.info(
        `📦 [QUICK STACK] Moved ${total} item(s) in ${transferCount} transfer(s)`,
        LogCategory.STORAGE,
      );
    }
    return total;
  }
}
