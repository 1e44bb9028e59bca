/**
 * Seeded linear congruential generator returning values in [0, 1).
 * The same seed always yields the same sequence.
 */
export function createSeededRandom(seed: number): () => number {
  let state = Math.floor(seed) & 0x7fffffff;
  return () => {
    state = (Math.imul(state, 1103515245) + 12345) & 0x7fffffff;
    return state / 0x80000000;
  };
}
