export type RNG = () => number;
export type Seed = number | string;

export function mulberry32(seed: number): RNG {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let r = Math.imul(state ^ (state >>> 15), state | 1);
    r ^= r + Math.imul(r ^ (r >>> 7), r | 61);
    return ((r ^ (r >>> 14)) >>> 0) / 2 ** 32;
  };
}

// FNV-1a, so labels like "table-3" can seed a run.
function hashSeed(seed: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < seed.length; i += 1) {
    hash ^= seed.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

/** Without a seed this falls back to Math.random. */
export function createRng(seed?: Seed): RNG {
  if (seed === undefined) {
    return Math.random;
  }
  return mulberry32(typeof seed === "string" ? hashSeed(seed) : seed);
}

export function shuffleInPlace<T>(items: T[], rng: RNG): T[] {
  for (let i = items.length - 1; i > 0; i -= 1) {
    const j = Math.floor(rng() * (i + 1));
    [items[i], items[j]] = [items[j], items[i]];
  }
  return items;
}
