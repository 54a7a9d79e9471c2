import seedrandom from "seedrandom";

/**
 * Shared utility for random number generation.
 * Centralizes RNG so tests can seed it.
 */
export class RandomUtils {
  private static rng: seedrandom.PRNG = seedrandom();

  /**
   * Reseeds the shared generator. Without a seed it returns to an auto-seeded one.
   */
  public static seed(seed?: string): void {
    RandomUtils.rng = seed === undefined ? seedrandom() : seedrandom(seed);
  }

  /**
   * Creates an independent generator, useful for reproducible layouts.
   */
  public static createGenerator(seed: string): seedrandom.PRNG {
    return seedrandom(seed);
  }

  /**
   * Returns a random floating-point number between 0 (inclusive) and 1 (exclusive).
   */
  public static float(): number {
    return RandomUtils.rng();
  }

  /**
   * Returns a random integer between min (inclusive) and max (inclusive).
   */
  public static intRange(
    min: number,
    max: number,
    rng: seedrandom.PRNG = RandomUtils.rng,
  ): number {
    return Math.floor(rng() * (max - min + 1)) + min;
  }

  /**
   * Returns true with the specified probability (0-1).
   */
  public static chance(
    probability: number,
    rng: seedrandom.PRNG = RandomUtils.rng,
  ): boolean {
    return rng() < probability;
  }

  /**
   * Returns a random element from an array.
   */
  public static element<T>(
    array: readonly T[],
    rng: seedrandom.PRNG = RandomUtils.rng,
  ): T | undefined {
    if (array.length === 0) return undefined;
    return array[Math.floor(rng() * array.length)];
  }
}
