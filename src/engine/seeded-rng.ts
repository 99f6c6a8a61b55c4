/**
 * Creates a deterministic seeded RNG using the Mulberry32 algorithm.
 * Returns a function that yields values in [0, 1). Same seed produces identical sequence.
 * The seed is folded to an unsigned 32-bit integer first, so 2^32 + n replays n.
 */
export function createSeededRNG(seed: number): () => number {
  let state = seed >>> 0;
  return function (): number {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Fresh seed for callers that do not ask for reproducibility.
 */
export function generateSeed(): number {
  return Math.floor(Math.random() * 4294967296);
}
