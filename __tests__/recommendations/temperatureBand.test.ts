/**
 * @fileoverview Unit tests for temperature bucketing.
 *
 * Bands are inclusive at their lower bound, so the cases at 14/15 and
 * 20/21 pin the boundaries.
 *
 * @module __tests__/recommendations/temperatureBand
 */

import {
  HOT_THRESHOLD,
  MEDIUM_THRESHOLD,
  temperatureBand,
} from '../../src/features/recommendations/utils/temperatureBand';

describe('temperatureBand', () => {
  it.each([
    [21, 'hot'],
    [20, 'medium'],
    [15, 'medium'],
    [14, 'cold'],
  ])('maps %i°C to %s at the band boundaries', (temperature, expected) => {
    expect(temperatureBand(temperature)).toBe(expected);
  });

  it('maps extreme temperatures to the outer bands', () => {
    expect(temperatureBand(40)).toBe('hot');
    expect(temperatureBand(0)).toBe('cold');
    expect(temperatureBand(-12)).toBe('cold');
  });

  it('exposes the thresholds used for bucketing', () => {
    expect(HOT_THRESHOLD).toBe(21);
    expect(MEDIUM_THRESHOLD).toBe(15);
  });
});
