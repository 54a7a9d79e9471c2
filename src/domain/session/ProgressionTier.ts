/**
 * Progression tiers gate how far from the player registered containers and
 * remembered stations can be used. Ranges are in tiles.
 */
export const MIN_TIER = 0;
export const MAX_TIER = 4;

const TIER_RANGES: readonly number[] = [50, 100, 500, 1000, Infinity];

const TIER_NAMES: readonly string[] = [
  "Starter",
  "Explorer",
  "Delver",
  "Artisan",
  "Worldwide",
];

export function clampTier(tier: number): number {
  if (!Number.isFinite(tier)) return tier > 0 ? MAX_TIER : MIN_TIER;
  return Math.min(MAX_TIER, Math.max(MIN_TIER, Math.trunc(tier)));
}

/**
 * Access range in tiles; the last tier covers the whole world.
 */
export function getTierRange(tier: number): number {
  return TIER_RANGES[clampTier(tier)];
}

export function getTierName(tier: number): string {
  if (!Number.isInteger(tier) || tier < MIN_TIER || tier > MAX_TIER) {
    return "Unknown";
  }
  return TIER_NAMES[tier];
}

/**
 * Stations visited once stay available from tier 3 on.
 */
export function hasStationMemory(tier: number): boolean {
  return clampTier(tier) >= 3;
}
