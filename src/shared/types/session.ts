import type { SpecialUnlock } from "../constants/CraftingEnums";

/**
 * Per-session choices. Built once when the world is opened and discarded with
 * the session container.
 */
export interface SessionSettings {
  /** Progression tier 0..4 */
  tier: number;
  specialUnlocks: readonly SpecialUnlock[];
  stationMemoryEnabled: boolean;
  rememberedStations: readonly string[];
  /** 0 = bounded only by MAX_CRAFT_DEPTH */
  maxCraftDepth: number;
  maxNetworkNodes: number;
}
