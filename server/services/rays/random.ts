import crypto from "node:crypto";

export type RandomSource = () => number;

export const mulberry32 = (seed: number): RandomSource => {
  let t = seed >>> 0;
  return () => {
    t += 0x6d2b79f5;
    let r = Math.imul(t ^ (t >>> 15), t | 1);
    r ^= r + Math.imul(r ^ (r >>> 7), r | 61);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
};

export const seedFromString = (value: string): number => {
  const hash = crypto.createHash("sha256").update(value, "utf8").digest("hex");
  const seed = parseInt(hash.slice(0, 8), 16);
  return Number.isFinite(seed) ? seed : 0;
};

/** Seeded when a seed is given, Math.random otherwise. */
export const createRandomSource = (seed?: string): RandomSource =>
  seed === undefined ? Math.random : mulberry32(seedFromString(seed));

/**
 * Uniform sample of `k` distinct entries of `pool` (partial Fisher-Yates on a copy).
 * Returns the whole pool, shuffled, when k >= pool.length.
 */
export function sampleWithoutReplacement(pool: ArrayLike<number>, k: number, random: RandomSource): Uint32Array {
  const scratch = Uint32Array.from(pool);
  const take = Math.min(Math.max(0, Math.floor(k)), scratch.length);
  for (let i = 0; i < take; i += 1) {
    const j = i + Math.floor(random() * (scratch.length - i));
    const swap = scratch[i];
    scratch[i] = scratch[j];
    scratch[j] = swap;
  }
  return scratch.slice(0, take);
}

export const rangeIndices = (size: number): Uint32Array => {
  const out = new Uint32Array(size);
  for (let i = 0; i < size; i += 1) out[i] = i;
  return out;
};
