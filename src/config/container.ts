import "reflect-metadata";
import { Container } from "inversify";
import { TYPES } from "./Types";

/**
 * Dependency injection container configuration.
 *
 * One container per play session. Host seams are bound as constants, engine
 * components as singletons of that container, so nothing outlives the
 * session that created it.
 *
 * @module config
 */
import { CraftabilityChecker } from "../domain/crafting/CraftabilityChecker";
import { CraftingExecutor } from "../domain/crafting/CraftingExecutor";
import { CraftingService } from "../domain/crafting/CraftingService";
import { RecipeIndex } from "../domain/crafting/RecipeIndex";
import { RecursiveCrafter } from "../domain/crafting/RecursiveCrafter";
import { StationTracker } from "../domain/crafting/StationTracker";
import { ChestRegistry } from "../domain/storage/ChestRegistry";
import type { IStorageProvider } from "../domain/storage/IStorageProvider";
import { SingleplayerProvider } from "../domain/storage/SingleplayerProvider";
import { StorageEventBus } from "../domain/storage/StorageEventBus";
import { StorageNetworkResolver } from "../domain/storage/StorageNetworkResolver";
import type { SandboxWorld } from "../domain/world/SandboxWorld";
import type { RecipeCatalog } from "../shared/types/crafting";
import type { SessionSettings } from "../shared/types/session";
import type {
  ContainerAccess,
  InventoryAccess,
  ItemCatalogAccess,
  StationSource,
  TileLookup,
} from "../shared/types/world";

export interface HostSeams {
  tiles: TileLookup;
  containers: ContainerAccess;
  inventory: InventoryAccess;
  items: ItemCatalogAccess;
  stations: StationSource;
}

export function createSessionContainer(
  host: HostSeams,
  catalog: RecipeCatalog,
  settings: SessionSettings,
): Container {
  const container = new Container();

  container.bind<SessionSettings>(TYPES.SessionSettings).toConstantValue(settings);
  container.bind<RecipeCatalog>(TYPES.RecipeCatalog).toConstantValue(catalog);

  container.bind<TileLookup>(TYPES.TileLookup).toConstantValue(host.tiles);
  container.bind<ContainerAccess>(TYPES.ContainerAccess).toConstantValue(host.containers);
  container.bind<InventoryAccess>(TYPES.InventoryAccess).toConstantValue(host.inventory);
  container.bind<ItemCatalogAccess>(TYPES.ItemCatalog).toConstantValue(host.items);
  container.bind<StationSource>(TYPES.StationSource).toConstantValue(host.stations);

  container.bind<StorageEventBus>(TYPES.StorageEventBus).to(StorageEventBus).inSingletonScope();
  container
    .bind<StorageNetworkResolver>(TYPES.StorageNetworkResolver)
    .to(StorageNetworkResolver)
    .inSingletonScope();
  container.bind<ChestRegistry>(TYPES.ChestRegistry).to(ChestRegistry).inSingletonScope();
  container
    .bind<IStorageProvider>(TYPES.StorageProvider)
    .to(SingleplayerProvider)
    .inSingletonScope();

  container.bind<RecipeIndex>(TYPES.RecipeIndex).to(RecipeIndex).inSingletonScope();
  container.bind<StationTracker>(TYPES.StationTracker).to(StationTracker).inSingletonScope();
  container
    .bind<CraftabilityChecker>(TYPES.CraftabilityChecker)
    .to(CraftabilityChecker)
    .inSingletonScope();
  container
    .bind<CraftingExecutor>(TYPES.CraftingExecutor)
    .to(CraftingExecutor)
    .inSingletonScope();
  container
    .bind<RecursiveCrafter>(TYPES.RecursiveCrafter)
    .to(RecursiveCrafter)
    .inSingletonScope();
  container.bind<CraftingService>(TYPES.CraftingService).to(CraftingService).inSingletonScope();

  return container;
}

/**
 * Session container over a sandbox world, with `registered` positions added
 * to the chest registry.
 */
export function createSandboxContainer(
  world: SandboxWorld,
  catalog: RecipeCatalog,
  settings: SessionSettings,
  registered: readonly { x: number; y: number }[] = [],
): Container {
  const container = createSessionContainer(world, catalog, settings);
  const registry = container.get<ChestRegistry>(TYPES.ChestRegistry);
  for (const position of registered) registry.register(position);
  return container;
}
