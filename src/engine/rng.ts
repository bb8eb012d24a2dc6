export type Rng = () => number;

// mulberry32: 32-bit state, floats in [0, 1)
export function createRng(seed: number): Rng {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Uniform integer in [0, bound). */
export function randomInt(rng: Rng, bound: number): number {
  return Math.floor(rng() * bound);
}

export function pickRandom<T>(items: ArrayLike<T>, rng: Rng): T {
  return items[randomInt(rng, items.length)];
}

export function resolveSeed(seed?: number): number {
  return seed ?? Date.now();
}
