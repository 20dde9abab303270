/**
 * Injectable random sources. Every shuffle and interval draw in a run goes
 * through one of these so a fixed seed reproduces the same timeline.
 */

export interface RandomSource {
  /** Uniform float in [0, 1). */
  next(): number;
}

/** mulberry32 — small, fast, and stable across platforms. */
export function seededRandom(seed: number): RandomSource {
  let t = seed >>> 0;
  return {
    next: () => {
      t = (t + 0x6d2b79f5) >>> 0;
      let r = Math.imul(t ^ (t >>> 15), 1 | t);
      r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
      return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
    },
  };
}

export const mathRandom: RandomSource = { next: () => Math.random() };

export function createRandom(seed?: number): RandomSource {
  return seed === undefined ? mathRandom : seededRandom(seed);
}

/** Uniform float in [min, max]. */
export function uniform(random: RandomSource, min: number, max: number): number {
  return min + (max - min) * random.next();
}

/** Fisher–Yates over a copy; the input is left untouched. */
export function shuffled<T>(items: readonly T[], random: RandomSource): T[] {
  const out = items.slice();
  for (let i = out.length - 1; i > 0; i--) {
    const j = Math.floor(random.next() * (i + 1));
    [out[i], out[j]] = [out[j], out[i]];
  }
  return out;
}
