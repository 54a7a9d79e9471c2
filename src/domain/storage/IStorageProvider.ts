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
import type { Position } from "@/shared/types/world";

/**
 * What items exist and how they move between member containers and the
 * player inventory.
 *
 * Read-only members return the same answer on repeated calls with no
 * intervening write and never touch any container.
 */
export interface IStorageProvider {
  getItemCount(itemId: string): number;
  getStorageCount(itemId: string): number;
  getInventoryCount(itemId: string): number;
  getAllItems(): ItemSnapshot[];
  getMaterialView(): MaterialView;
  getItemsInRange(center: Position, rangeTiles: number): ItemSnapshot[];
  isContainerInRange(position: Position, center: Position, rangeTiles: number): boolean;
  getRegisteredContainers(): RegisteredContainerInfo[];
  /** Units of `itemId` member containers could still take */
  getStorageCapacity(itemId: string, prefix?: number): number;
  getInventoryCapacity(itemId: string, prefix?: number): number;
  /**
   * Replays crafts in order on copies of the member and inventory slots,
   * withdrawing and depositing the way the mutating members do.
   */
  simulateCrafts(crafts: readonly SimulatedCraft[]): CraftSimulation;

  /** @returns amount actually withdrawn, never more than requested or held */
  tryWithdraw(itemId: string, count: number): number;
  tryWithdrawFromInventory(itemId: string, count: number): number;
  /** @returns remainder that did not fit */
  tryDeposit(itemId: string, count: number, prefix?: number): number;
  tryDepositToInventory(itemId: string, count: number, prefix?: number): number;
  depositFromInventorySlot(slot: number, singleItemOnly: boolean): number;
  quickStackInventory(
    includeHotbar: boolean,
    includeFavorited: boolean,
    outTransfers?: QuickStackTransfer[],
  ): number;

  useTemporaryPositions(
    positions: Iterable<Readonly<Position>>,
    options?: TemporaryScopeOptions,
  ): TemporaryMembershipScope;
  withTemporaryPositions<T>(
    positions: Iterable<Readonly<Position>>,
    fn: () => T,
    options?: TemporaryScopeOptions,
  ): T;
}
