/**
 * Temperature bucketing.
 *
 * Bands are inclusive at their lower bound:
 * - hot: 21 and above
 * - medium: 15 to 20
 * - cold: below 15
 *
 * @module features/recommendations/utils/temperatureBand
 */

import type { TemperatureBand } from '../../catalog/types';

/** Lowest temperature (°C) in the hot band */
export const HOT_THRESHOLD = 21;

/** Lowest temperature (°C) in the medium band */
export const MEDIUM_THRESHOLD = 15;

/**
 * Maps a temperature in degrees Celsius to its band.
 */
export function temperatureBand(tempCelsius: number): TemperatureBand {
  if (tempCelsius >= HOT_THRESHOLD) {
    return 'hot';
  }
  if (tempCelsius >= MEDIUM_THRESHOLD) {
    return 'medium';
  }
  return 'cold';
}
