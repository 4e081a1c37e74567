// packages/core/src/utils/random.ts -- injectable randomness for persona and template choices

export interface Rng {
  /** Uniform float in [0, 1). */
  next(): number;
}

/** Deterministic PRNG so persona choices can be replayed from a seed. */
export function mulberry32(seed: number): Rng {
  let a = seed >>> 0;
  return {
    next(): number {
      a = (a + 0x6d2b79f5) >>> 0;
      let t = a;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    },
  };
}

export const mathRandom: Rng = { next: () => Math.random() };

/** Pick one element. Throws on an empty list. */
export function pick<T>(rng: Rng, items: readonly T[]): T {
  if (items.length === 0) {
    throw new RangeError('Cannot pick from an empty list');
  }
  const index = Math.min(items.length - 1, Math.floor(rng.next() * items.length));
  return items[index];
}
