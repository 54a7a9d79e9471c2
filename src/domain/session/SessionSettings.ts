import { CONFIG } from "@/config/config";
import { SpecialUnlock } from "@/shared/constants/CraftingEnums";
import type { SessionSettings } from "@/shared/types/session";
import { clampTier } from "./ProgressionTier";

export function createSessionSettings(
  overrides: Partial<SessionSettings> = {},
): SessionSettings {
  const maxCraftDepth = overrides.maxCraftDepth ?? 0;
  const maxNetworkNodes = overrides.maxNetworkNodes ?? CONFIG.MAX_NETWORK_NODES;

  return Object.freeze({
    tier: clampTier(overrides.tier ?? 0),
    specialUnlocks: Object.freeze([...new Set(overrides.specialUnlocks ?? [])]),
    stationMemoryEnabled: overrides.stationMemoryEnabled ?? true,
    rememberedStations: Object.freeze([...(overrides.rememberedStations ?? [])]),
    maxCraftDepth:
      Number.isInteger(maxCraftDepth) && maxCraftDepth > 0 ? maxCraftDepth : 0,
    maxNetworkNodes:
      Number.isInteger(maxNetworkNodes) && maxNetworkNodes > 0
        ? maxNetworkNodes
        : CONFIG.MAX_NETWORK_NODES,
  });
}

/**
 * Depth actually enforced: the user limit when set, never above MAX_CRAFT_DEPTH.
 */
export function resolveCraftDepth(settings: SessionSettings): number {
  if (settings.maxCraftDepth <= 0) return CONFIG.MAX_CRAFT_DEPTH;
  return Math.min(settings.maxCraftDepth, CONFIG.MAX_CRAFT_DEPTH);
}

export function isSpecialUnlock(value: unknown): value is SpecialUnlock {
  return Object.values(SpecialUnlock).some((unlock) => unlock === value);
}
