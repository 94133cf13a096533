/**
 * Outfit assembly.
 *
 * Runs item selection independently for each category needed today and
 * renders the result as the "Today's Outfit" report.
 *
 * Jacket rule: the jacket slot is requested when it is rainy OR the
 * temperature band is cold. Rain alone is enough, even when hot.
 *
 * Slots are independent: a category with no match is reported as
 * "Sorry, no suitable <category>" and does not affect the others.
 *
 * @module features/recommendations/utils/assembleOutfit
 */

import {
  formatItem,
  type Catalog,
  type Category,
  type TemperatureBand,
  type Weather,
} from '../../catalog/types';
import type { Outfit, OutfitQuery, OutfitSlot, RandomSource } from '../types';
import { choose } from './chooseItem';
import { mathRandomSource } from './randomSource';
import { temperatureBand } from './temperatureBand';

/** Categories present in every outfit, in report order */
export const BASE_OUTFIT_CATEGORIES: readonly Category[] = ['shirt', 'pants', 'shoes'];

/**
 * Whether today's conditions call for a jacket.
 */
export function needsJacket(weather: Weather, band: TemperatureBand): boolean {
  return weather === 'rainy' || band === 'cold';
}

/**
 * Returns the categories to fill for the given conditions, in report order.
 */
export function outfitCategories(weather: Weather, band: TemperatureBand): Category[] {
  return needsJacket(weather, band)
    ? ['jacket', ...BASE_OUTFIT_CATEGORIES]
    : [...BASE_OUTFIT_CATEGORIES];
}

/**
 * Assembles an outfit from the catalog.
 *
 * Only the categories returned by `outfitCategories` are selected, so the
 * random source is not consulted for a jacket that will not be reported.
 */
export function assembleOutfit(
  catalog: Catalog,
  query: OutfitQuery,
  random: RandomSource = mathRandomSource
): Outfit {
  const band = temperatureBand(query.temperature);
  const categories = outfitCategories(query.weather, band);

  const slots: OutfitSlot[] = categories.map((category) => ({
    category,
    item: choose(catalog, category, query.temperature, query.style, random),
  }));

  return {
    temperatureBand: band,
    includesJacket: categories.includes('jacket'),
    slots,
  };
}

// ============================================================================
// Rendering
// ============================================================================

export const OUTFIT_REPORT_HEADING = "Today's Outfit:";

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

/**
 * Renders one slot, e.g. `Jacket: Parka/Blue` or
 * `Pants: Sorry, no suitable pants`.
 */
export function formatOutfitSlot(slot: OutfitSlot): string {
  const label = capitalize(slot.category);
  return slot.item
    ? `${label}: ${formatItem(slot.item)}`
    : `${label}: Sorry, no suitable ${slot.category}`;
}

/**
 * Renders the full report as lines, heading first.
 */
export function formatOutfitReport(outfit: Outfit): string[] {
  return [OUTFIT_REPORT_HEADING, ...outfit.slots.map(formatOutfitSlot)];
}
