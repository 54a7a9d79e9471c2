/**
 * Crafting enumerations.
 *
 * @module shared/constants/CraftingEnums
 */

/**
 * Failure codes reported by the checker, the crafter and the executor.
 * None of them is ever thrown.
 */
export enum CraftErrorCode {
  INSUFFICIENT_MATERIALS = "InsufficientMaterials",
  CYCLIC_RECIPE = "CyclicRecipe",
  STATION_MISSING = "StationMissing",
  PARTIAL_CRAFT_FAILURE = "PartialCraftFailure",
  WRITE_CONFLICT = "WriteConflict",
  NO_CAPACITY = "NoCapacity",
  NO_RECIPE = "NoRecipe",
  RECURSION_LIMIT = "RecursionLimit",
  INVALID_REQUEST = "InvalidRequest",
}

/**
 * Single-level status of one recipe against the current materials.
 */
export enum CraftStatus {
  CRAFTABLE = "craftable",
  MISSING_MATERIALS = "missing_materials",
  MISSING_STATION = "missing_station",
  MISSING_ENVIRONMENT = "missing_environment",
  INVALID_RECIPE = "invalid_recipe",
}

/**
 * States of a crafting request.
 * Idle -> Checking -> Infeasible
 * Idle -> Checking -> Planning -> Executing -> Completed | PartialCraftFailure
 */
export enum CraftRequestState {
  IDLE = "idle",
  CHECKING = "checking",
  INFEASIBLE = "infeasible",
  PLANNING = "planning",
  EXECUTING = "executing",
  COMPLETED = "completed",
  PARTIAL_CRAFT_FAILURE = "partial_craft_failure",
}

export enum EnvironmentCondition {
  WATER = "water",
  HONEY = "honey",
  LAVA = "lava",
  SNOW = "snow",
  GRAVEYARD = "graveyard",
  SHIMMER = "shimmer",
}

/**
 * Unlocks bought with consumables. They satisfy a condition or a station
 * without the player standing next to it.
 */
export enum SpecialUnlock {
  WATER = "water",
  HONEY = "honey",
  LAVA = "lava",
  SHIMMER = "shimmer",
  SNOW = "snow",
  GRAVEYARD = "graveyard",
  DEMON_ALTAR = "demonAltar",
  CRIMSON_ALTAR = "crimsonAltar",
}
