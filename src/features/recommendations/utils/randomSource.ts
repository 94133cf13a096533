/**
 * Random source implementations.
 *
 * @module features/recommendations/utils/randomSource
 */

import type { RandomSource } from '../types';

/**
 * Random source backed by `Math.random`.
 */
export const mathRandomSource: RandomSource = {
  pickIndex(count: number): number {
    return Math.floor(Math.random() * count);
  },
};

/**
 * Picks one element of a list using the random source.
 *
 * Returns null for an empty list.
 */
export function pickOne<T>(values: readonly T[], random: RandomSource): T | null {
  if (values.length === 0) {
    return null;
  }
  return values[random.pickIndex(values.length)] ?? null;
}
