import type { EnvironmentCondition } from "@/shared/constants/CraftingEnums";
import type { StationSource } from "@/shared/types/world";

/**
 * Station source backed by plain lists, set by the host or a test.
 */
export class StaticStationSource implements StationSource {
  private stations: string[];
  private conditions: EnvironmentCondition[];

  constructor(
    stations: readonly string[] = [],
    conditions: readonly EnvironmentCondition[] = [],
  ) {
    this.stations = [...stations];
    this.conditions = [...conditions];
  }

  public setStations(stations: readonly string[]): void {
    this.stations = [...stations];
  }

  public setConditions(conditions: readonly EnvironmentCondition[]): void {
    this.conditions = [...conditions];
  }

  public getNearbyStations(): readonly string[] {
    return this.stations;
  }

  public getNearbyConditions(): readonly EnvironmentCondition[] {
    return this.conditions;
  }
}
