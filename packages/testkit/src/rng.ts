/**
 * packages/testkit/src/rng.ts — Seeded deterministic RNG for property-style tests.
 *
 * Why: Randomized tests must be reproducible from a logged seed. This is a
 * 32-bit LCG (Numerical Recipes constants); quality is irrelevant, stability is not.
 */

export type Rng = Readonly<{
  seed: number;
  /** Next unsigned 32-bit value. */
  u32: () => number;
  /** Next float in [0, 1). */
  next: () => number;
  /** Inclusive integer range. */
  int: (min: number, max: number) => number;
  pick: <T>(values: readonly T[]) => T;
  chance: (percent: number) => boolean;
}>;

export function createRng(seed: number): Rng {
  let state = seed >>> 0;
  const u32 = (): number => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state;
  };
  const next = (): number => u32() / 4294967296;
  const int = (min: number, max: number): number => {
    if (max <= min) return min;
    return min + (u32() % (max - min + 1));
  };
  const pick = <T>(values: readonly T[]): T => {
    if (values.length === 0) throw new Error("createRng.pick: empty list");
    const v = values[u32() % values.length];
    if (v === undefined) throw new Error("createRng.pick: hole in list");
    return v;
  };
  const chance = (percent: number): boolean => u32() % 100 < percent;
  return Object.freeze({ seed, u32, next, int, pick, chance });
}
