/**
 * Dependency injection type symbols.
 *
 * Host seams are bound as constants, engine components as session singletons.
 *
 * @module config
 */
export const TYPES = {
  SessionSettings: Symbol.for("SessionSettings"),
  RecipeCatalog: Symbol.for("RecipeCatalog"),

  TileLookup: Symbol.for("TileLookup"),
  ContainerAccess: Symbol.for("ContainerAccess"),
  InventoryAccess: Symbol.for("InventoryAccess"),
  ItemCatalog: Symbol.for("ItemCatalog"),
  StationSource: Symbol.for("StationSource"),

  StorageEventBus: Symbol.for("StorageEventBus"),
  StorageNetworkResolver: Symbol.for("StorageNetworkResolver"),
  ChestRegistry: Symbol.for("ChestRegistry"),
  StorageProvider: Symbol.for("StorageProvider"),

  RecipeIndex: Symbol.for("RecipeIndex"),
  StationTracker: Symbol.for("StationTracker"),
  CraftabilityChecker: Symbol.for("CraftabilityChecker"),
  CraftingExecutor: Symbol.for("CraftingExecutor"),
  RecursiveCrafter: Symbol.for("RecursiveCrafter"),
  CraftingService: Symbol.for("CraftingService"),
};
