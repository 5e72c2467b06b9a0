// rulecore/utils/Rng.ts
// Injectable randomness. Everything that rolls takes a RandomSource so tests
// can pin outcomes with a stub or a seed.

/** Returns a float in [0, 1). */
export type RandomSource = () => number;

export const mathRandom: RandomSource = () => Math.random();

function hashString(str: string): number {
  let h = 1779033703 ^ str.length;
  for (let i = 0; i < str.length; i++) {
    h = Math.imul(h ^ str.charCodeAt(i), 3432918353);
    h = (h << 13) | (h >>> 19);
  }
  return (h >>> 0) || 1;
}

/** Mulberry32 stream; same seed, same sequence. */
export function seededRandom(seed: string | number): RandomSource {
  let state = typeof seed === "number" ? (seed >>> 0) || 1 : hashString(seed);

  return () => {
    let t = (state += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), 61 | t);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Uniform integer in [min, maxInclusive]. */
export function randomInt(rng: RandomSource, min: number, maxInclusive: number): number {
  if (maxInclusive <= min) return min;
  const r = rng();
  if (!Number.isFinite(r)) {
    throw new RangeError(`random source returned ${r}; expected a number in [0, 1)`);
  }
  // Clamp stubs that hand back 1.0 so the top face stays reachable but never exceeded.
  const unit = r >= 1 ? 0.9999999999 : r < 0 ? 0 : r;
  return min + Math.floor(unit * (maxInclusive - min + 1));
}
