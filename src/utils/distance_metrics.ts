import { Vector } from '../types';

/**
 * Euclidean distance (L2 norm)
 * Vectors of different length are compared over their common prefix.
 * @param a First vector
 * @param b Second vector
 * @returns Euclidean distance between vectors
 */
export function euclidean(a: Vector, b: Vector): number {
  let sum = 0;
  const len = Math.min(a.length, b.length);

  for (let i = 0; i < len; i++) {
    const diff = a[i] - b[i];
    sum += diff * diff;
  }

  return Math.sqrt(sum);
}

export default {
  euclidean,
};
