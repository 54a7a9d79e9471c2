import type { IngredientSource } from "@/shared/types/crafting";
import type { MaterialView } from "@/shared/types/storage";

/**
 * Local, mutable material counts split by origin. Analysis and plan
 * validation draw from a pool, never from real storage.
 */
export class MaterialPool {
  private constructor(
    private readonly storage: Map<string, number>,
    private readonly inventory: Map<string, number>,
  ) {}

  public static fromView(view: MaterialView): MaterialPool {
    return new MaterialPool(new Map(view.storage), new Map(view.inventory));
  }

  public static empty(): MaterialPool {
    return new MaterialPool(new Map(), new Map());
  }

  public clone(): MaterialPool {
    return new MaterialPool(new Map(this.storage), new Map(this.inventory));
  }

  public count(itemId: string): number {
    return (this.storage.get(itemId) ?? 0) + (this.inventory.get(itemId) ?? 0);
  }

  /**
   * Takes up to `amount`, storage first, then inventory.
   */
  public takeUpTo(itemId: string, amount: number): IngredientSource {
    const inStorage = this.storage.get(itemId) ?? 0;
    const fromStorage = Math.min(inStorage, amount);
    const inInventory = this.inventory.get(itemId) ?? 0;
    const fromInventory = Math.min(inInventory, amount - fromStorage);

    this.set(this.storage, itemId, inStorage - fromStorage);
    this.set(this.inventory, itemId, inInventory - fromInventory);
    return { itemId, fromStorage, fromInventory };
  }

  /**
   * Takes exactly the given split, or nothing when either side falls short.
   */
  public takeExact(source: IngredientSource): boolean {
    const inStorage = this.storage.get(source.itemId) ?? 0;
    const inInventory = this.inventory.get(source.itemId) ?? 0;
    if (inStorage < source.fromStorage || inInventory < source.fromInventory) {
      return false;
    }
    this.set(this.storage, source.itemId, inStorage - source.fromStorage);
    this.set(this.inventory, source.itemId, inInventory - source.fromInventory);
    return true;
  }

  /**
   * Crafted output lands in storage.
   */
  public add(itemId: string, amount: number): void {
    if (amount <= 0) return;
    this.storage.set(itemId, (this.storage.get(itemId) ?? 0) + amount);
  }

  public toView(): MaterialView {
    return { storage: new Map(this.storage), inventory: new Map(this.inventory) };
  }

  public totals(): Map<string, number> {
    const totals = new Map(this.storage);
    for (const [itemId, amount] of this.inventory) {
      totals.set(itemId, (totals.get(itemId) ?? 0) + amount);
    }
    return totals;
  }

  private set(map: Map<string, number>, itemId: string, value: number): void {
    if (value > 0) map.set(itemId, value);
    else map.delete(itemId);
  }
}
