import { describe, it, expect } from "vitest";
import {
  clampTier,
  getTierName,
  getTierRange,
  hasStationMemory,
} from "../../src/domain/session/ProgressionTier";

describe("ProgressionTier", () => {
  it("debe acotar el tier al rango 0..4", () => {
    expect(clampTier(7)).toBe(4);
    expect(clampTier(-1)).toBe(0);
    expect(clampTier(2.9)).toBe(2);
    expect(clampTier(Infinity)).toBe(4);
    expect(clampTier(NaN)).toBe(0);
  });

  it("debe crecer el alcance con el tier", () => {
    expect(getTierRange(0)).toBe(50);
    expect(getTierRange(3)).toBe(1000);
    expect(getTierRange(4)).toBe(Infinity);
    expect(getTierRange(99)).toBe(Infinity);
  });

  it("debe nombrar los tiers válidos", () => {
    expect(getTierName(1)).toBe("Explorer");
    expect(getTierName(5)).toBe("Unknown");
    expect(getTierName(1.5)).toBe("Unknown");
  });

  it("debe habilitar la memoria de estaciones desde el tier 3", () => {
    expect(hasStationMemory(2)).toBe(false);
    expect(hasStationMemory(3)).toBe(true);
  });
});
