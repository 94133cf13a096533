/**
 * Type definitions for the clothing catalog.
 *
 * Enumerated attributes (category, temperature band, style, weather) are
 * closed unions backed by zod enums so that raw strings from the CSV file or
 * from the prompt are parsed once at the boundary and never travel further
 * as free text.
 *
 * @module features/catalog/types
 */

import { z } from 'zod';

// ============================================================================
// Enumerations
// ============================================================================

/**
 * Item categories, in the order an outfit is reported.
 */
export const CATEGORIES = ['jacket', 'shirt', 'pants', 'shoes'] as const;

export const TEMPERATURE_BANDS = ['cold', 'medium', 'hot'] as const;

export const STYLES = ['casual', 'formal'] as const;

export const WEATHER_CONDITIONS = ['rainy', 'sunny'] as const;

export const CategorySchema = z.enum(CATEGORIES);
export const TemperatureBandSchema = z.enum(TEMPERATURE_BANDS);
export const StyleSchema = z.enum(STYLES);
export const WeatherSchema = z.enum(WEATHER_CONDITIONS);

export type Category = z.infer<typeof CategorySchema>;
export type TemperatureBand = z.infer<typeof TemperatureBandSchema>;
export type Style = z.infer<typeof StyleSchema>;
export type Weather = z.infer<typeof WeatherSchema>;

// ============================================================================
// Item
// ============================================================================

/**
 * A single clothing article.
 *
 * Items have no identity beyond their field values; two items with the same
 * fields are indistinguishable.
 */
export interface Item {
  readonly category: Category;
  readonly name: string;
  readonly color: string;
  /** Temperature band the item is suited to */
  readonly temperatureBand: TemperatureBand;
  readonly style: Style;
  readonly weather: Weather;
}

/**
 * The in-memory set of known items.
 *
 * Read-only: growing the catalog yields a new handle (see `appendToCatalog`).
 */
export type Catalog = readonly Item[];

/**
 * Column order of a persisted catalog record.
 *
 * The persisted header names the temperature band column `temperature`.
 */
export const CATALOG_COLUMNS = [
  'category',
  'name',
  'color',
  'temperature',
  'style',
  'weather',
] as const;

export type CatalogColumn = (typeof CATALOG_COLUMNS)[number];

/**
 * Returns the display form of an item, `name/color`.
 */
export function formatItem(item: Item): string {
  return `${item.name}/${item.color}`;
}

/**
 * Returns a new catalog with `item` added at the end.
 */
export function appendToCatalog(catalog: Catalog, item: Item): Catalog {
  return [...catalog, item];
}
