import type { ItemSnapshot, ItemSource } from "@/shared/types/storage";
import type { ItemCatalogAccess, ItemStack } from "@/shared/types/world";

/**
 * Copies a live stack into a frozen value. Nothing in the result refers back
 * to the slot it was read from.
 */
export function createItemSnapshot(
  stack: Readonly<ItemStack>,
  catalog: ItemCatalogAccess,
  source: ItemSource,
): ItemSnapshot {
  const frozenSource: ItemSource =
    source.kind === "storage"
      ? Object.freeze({
          kind: "storage",
          position: Object.freeze({ x: source.position.x, y: source.position.y }),
          slot: source.slot,
        })
      : Object.freeze({ kind: "inventory", slot: source.slot });

  return Object.freeze({
    itemId: stack.itemId,
    stack: stack.stack,
    prefix: stack.prefix,
    name: catalog.getName(stack.itemId),
    maxStack: catalog.getMaxStack(stack.itemId),
    favorited: stack.favorited ?? false,
    source: frozenSource,
  });
}

/**
 * Totals per item id over a list of snapshots.
 */
export function summarizeSnapshots(
  snapshots: readonly ItemSnapshot[],
): Map<string, number> {
  const totals = new Map<string, number>();
  for (const snapshot of snapshots) {
    totals.set(snapshot.itemId, (totals.get(snapshot.itemId) ?? 0) + snapshot.stack);
  }
  return totals;
}
