export type Random = {
  next: () => number;
  int: (min: number, max: number) => number;
  pick: <T>(items: readonly T[]) => T;
  sample: <T>(items: readonly T[], count: number) => T[];
};

/**
 * Deterministic PRNG (mulberry32). The same seed always yields the same
 * sequence.
 */
export function createRandom(seed: number): Random {
  let state = seed >>> 0;

  const next = (): number => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };

  const int = (min: number, max: number): number => min + Math.floor(next() * (max - min + 1));

  const pick = <T>(items: readonly T[]): T => {
    const item = items[int(0, items.length - 1)];
    if (item === undefined) {
      throw new Error("Cannot pick from an empty list");
    }
    return item;
  };

  const sample = <T>(items: readonly T[], count: number): T[] => {
    const pool = [...items];
    for (let i = pool.length - 1; i > 0; i--) {
      const j = int(0, i);
      const current = pool[i];
      const swap = pool[j];
      if (current !== undefined && swap !== undefined) {
        pool[i] = swap;
        pool[j] = current;
      }
    }
    return pool.slice(0, Math.max(0, Math.min(count, pool.length)));
  };

  return { next, int, pick, sample };
}
