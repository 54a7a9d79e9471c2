import { describe, it, expect } from "vitest";
import { CONFIG } from "../../src/config/config";
import {
  createSessionSettings,
  isSpecialUnlock,
  resolveCraftDepth,
} from "../../src/domain/session/SessionSettings";
import { SpecialUnlock } from "../../src/shared/constants/CraftingEnums";

describe("SessionSettings", () => {
  it("debe aplicar valores por defecto y congelar el resultado", () => {
    const settings = createSessionSettings();

    expect(settings).toEqual({
      tier: 0,
      specialUnlocks: [],
      stationMemoryEnabled: true,
      rememberedStations: [],
      maxCraftDepth: 0,
      maxNetworkNodes: CONFIG.MAX_NETWORK_NODES,
    });
    expect(Object.isFrozen(settings)).toBe(true);
  });

  it("debe normalizar valores inválidos", () => {
    const settings = createSessionSettings({
      tier: 9,
      specialUnlocks: [SpecialUnlock.HONEY, SpecialUnlock.HONEY],
      maxCraftDepth: -2,
      maxNetworkNodes: 1.5,
    });

    expect(settings.tier).toBe(4);
    expect(settings.specialUnlocks).toEqual([SpecialUnlock.HONEY]);
    expect(settings.maxCraftDepth).toBe(0);
    expect(settings.maxNetworkNodes).toBe(CONFIG.MAX_NETWORK_NODES);
  });

  it("resolveCraftDepth nunca debe superar el máximo global", () => {
    expect(resolveCraftDepth(createSessionSettings())).toBe(CONFIG.MAX_CRAFT_DEPTH);
    expect(resolveCraftDepth(createSessionSettings({ maxCraftDepth: 3 }))).toBe(
      Math.min(3, CONFIG.MAX_CRAFT_DEPTH),
    );
    expect(
      resolveCraftDepth(createSessionSettings({ maxCraftDepth: CONFIG.MAX_CRAFT_DEPTH + 5 })),
    ).toBe(CONFIG.MAX_CRAFT_DEPTH);
  });

  it("isSpecialUnlock debe reconocer solo los desbloqueos conocidos", () => {
    expect(isSpecialUnlock("demonAltar")).toBe(true);
    expect(isSpecialUnlock("moon")).toBe(false);
    expect(isSpecialUnlock(3)).toBe(false);
  });
});
