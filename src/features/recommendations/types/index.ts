/**
 * Type definitions for outfit recommendations.
 *
 * @module features/recommendations/types
 */

import type { Category, Item, Style, TemperatureBand, Weather } from '../../catalog/types';

/**
 * Source of randomness for item selection.
 *
 * Injected so tests can substitute a deterministic stub.
 */
export interface RandomSource {
  /**
   * Returns an integer in `[0, count)`.
   *
   * Only called with `count >= 1`.
   */
  pickIndex(count: number): number;
}

/**
 * Conditions an outfit is assembled for.
 */
export interface OutfitQuery {
  /** Today's temperature in whole degrees Celsius */
  temperature: number;
  style: Style;
  weather: Weather;
}

/**
 * One category position in an outfit.
 *
 * `item` is null when no catalog item matched; the other slots are unaffected.
 */
export interface OutfitSlot {
  category: Category;
  item: Item | null;
}

/**
 * Result of assembling an outfit.
 */
export interface Outfit {
  temperatureBand: TemperatureBand;
  /** Whether the jacket slot was requested (rainy or cold) */
  includesJacket: boolean;
  /** Slots in report order: jacket (when included), shirt, pants, shoes */
  slots: OutfitSlot[];
}
