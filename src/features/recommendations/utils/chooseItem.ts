/**
 * Item selection for a single outfit category.
 *
 * @module features/recommendations/utils/chooseItem
 */

import type { Catalog, Category, Item, Style, TemperatureBand } from '../../catalog/types';
import type { RandomSource } from '../types';
import { mathRandomSource, pickOne } from './randomSource';
import { temperatureBand } from './temperatureBand';

/**
 * Returns the catalog items matching category, band and style exactly.
 */
export function filterCandidates(
  catalog: Catalog,
  category: Category,
  band: TemperatureBand,
  style: Style
): Item[] {
  return catalog.filter(
    (item) => item.category === category && item.temperatureBand === band && item.style === style
  );
}

/**
 * Chooses one item for a category at the given temperature and style.
 *
 * Every candidate is equally likely. Returns null when nothing matches;
 * "no match" is a normal outcome, not an error.
 *
 * @example
 * ```ts
 * const jacket = choose(catalog, 'jacket', 10, 'casual');
 * console.log(jacket ? formatItem(jacket) : 'Sorry, no suitable jacket');
 * ```
 */
export function choose(
  catalog: Catalog,
  category: Category,
  tempCelsius: number,
  style: Style,
  random: RandomSource = mathRandomSource
): Item | null {
  const candidates = filterCandidates(catalog, category, temperatureBand(tempCelsius), style);
  return pickOne(candidates, random);
}
