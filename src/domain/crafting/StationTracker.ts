import { inject, injectable } from "inversify";
import { TYPES } from "@/config/Types";
import { logger, LogCategory } from "@/infrastructure/utils/logger";
import {
  EnvironmentCondition,
  SpecialUnlock,
} from "@/shared/constants/CraftingEnums";
import type { Recipe } from "@/shared/types/crafting";
import type { SessionSettings } from "@/shared/types/session";
import type { StationSource } from "@/shared/types/world";
import { hasStationMemory } from "../session/ProgressionTier";

export interface CraftingEnvironment {
  readonly stations: ReadonlySet<string>;
  readonly conditions: ReadonlySet<EnvironmentCondition>;
}

const UNLOCK_CONDITIONS: Partial<Record<SpecialUnlock, EnvironmentCondition>> = {
  [SpecialUnlock.WATER]: EnvironmentCondition.WATER,
  [SpecialUnlock.HONEY]: EnvironmentCondition.HONEY,
  [SpecialUnlock.LAVA]: EnvironmentCondition.LAVA,
  [SpecialUnlock.SNOW]: EnvironmentCondition.SNOW,
  [SpecialUnlock.GRAVEYARD]: EnvironmentCondition.GRAVEYARD,
  [SpecialUnlock.SHIMMER]: EnvironmentCondition.SHIMMER,
};

const UNLOCK_STATIONS: Partial<Record<SpecialUnlock, string>> = {
  [SpecialUnlock.DEMON_ALTAR]: "demon_altar",
  [SpecialUnlock.CRIMSON_ALTAR]: "crimson_altar",
};

/**
 * Which stations and environment conditions the player can craft with.
 *
 * Stations: nearby ones, remembered ones (tier with station memory and the
 * toggle on) and altars granted by special unlocks. Conditions: nearby ones
 * and special unlocks. Shimmer is never found nearby, only unlocked.
 */
@injectable()
export class StationTracker {
  private readonly remembered = new Set<string>();

  constructor(
    @inject(TYPES.StationSource) private readonly source: StationSource,
    @inject(TYPES.SessionSettings) private readonly settings: SessionSettings,
  ) {
    for (const station of settings.rememberedStations) this.remembered.add(station);
  }

  public isStationMemoryActive(): boolean {
    return this.settings.stationMemoryEnabled && hasStationMemory(this.settings.tier);
  }

  /**
   * Remembers a station the player has been next to.
   * @returns true the first time a station is seen
   */
  public registerStation(stationId: string): boolean {
    if (!stationId || this.remembered.has(stationId)) return false;
    this.remembered.add(stationId);
    logger.debug(`🔨 [STATIONS] Remembered station ${stationId}`, LogCategory.STATIONS);
    return true;
  }

  /**
   * Records every station the source currently reports as nearby.
   */
  public rememberNearbyStations(): number {
    let added = 0;
    for (const station of this.source.getNearbyStations()) {
      if (this.registerStation(station)) added++;
    }
    return added;
  }

  public getRememberedStations(): string[] {
    return [...this.remembered];
  }

  public snapshot(): CraftingEnvironment {
    const stations = new Set<string>(this.source.getNearbyStations());
    if (this.isStationMemoryActive()) {
      for (const station of this.remembered) stations.add(station);
    }

    const conditions = new Set<EnvironmentCondition>();
    for (const condition of this.source.getNearbyConditions()) {
      if (condition !== EnvironmentCondition.SHIMMER) conditions.add(condition);
    }

    for (const unlock of this.settings.specialUnlocks) {
      const condition = UNLOCK_CONDITIONS[unlock];
      if (condition) conditions.add(condition);
      const station = UNLOCK_STATIONS[unlock];
      if (station) stations.add(station);
    }

    return { stations, conditions };
  }

  public getMissingStations(
    recipe: Recipe,
    environment: CraftingEnvironment = this.snapshot(),
  ): string[] {
    return recipe.stations.filter((station) => !environment.stations.has(station));
  }

  public getMissingConditions(
    recipe: Recipe,
    environment: CraftingEnvironment = this.snapshot(),
  ): EnvironmentCondition[] {
    return recipe.conditions.filter((c) => !environment.conditions.has(c));
  }
}
