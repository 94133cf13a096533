/**
 * Item validation schemas and utilities.
 *
 * Raw values reach the catalog from two boundaries: records read from the
 * CSV file and answers typed at the `add` prompt. Both are described by
 * `RawItemFields` (keyed by persisted column name) and parsed by the same
 * zod schema, so an item inside the catalog always has valid enumerated
 * fields.
 *
 * Normalisation rules:
 * - Enumerated fields: trimmed, case-insensitive
 * - Name and color: trimmed, must not be empty
 *
 * @module features/catalog/utils/itemValidation
 */

import { z, type ZodIssue } from 'zod';
import { CatalogFormatError, InvalidInputError } from '../../../core/errors';
import {
  CATALOG_COLUMNS,
  CATEGORIES,
  STYLES,
  TEMPERATURE_BANDS,
  WEATHER_CONDITIONS,
  type CatalogColumn,
  type Item,
} from '../types';

// ============================================================================
// Zod Schemas
// ============================================================================

function oneOfMessage(values: readonly string[]): { message: string } {
  return { message: `must be one of ${values.join(', ')}` };
}

export const CategoryFieldSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(CATEGORIES, { errorMap: () => oneOfMessage(CATEGORIES) }));

export const TemperatureBandFieldSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(TEMPERATURE_BANDS, { errorMap: () => oneOfMessage(TEMPERATURE_BANDS) }));

export const StyleFieldSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(STYLES, { errorMap: () => oneOfMessage(STYLES) }));

export const WeatherFieldSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(WEATHER_CONDITIONS, { errorMap: () => oneOfMessage(WEATHER_CONDITIONS) }));

const TextFieldSchema = z.string().trim().min(1, 'must not be empty');

/**
 * Schema for a raw item, keyed by persisted column name.
 *
 * Output is an `Item`: the `temperature` column becomes `temperatureBand`.
 */
export const RawItemSchema = z
  .object({
    category: CategoryFieldSchema,
    name: TextFieldSchema,
    color: TextFieldSchema,
    temperature: TemperatureBandFieldSchema,
    style: StyleFieldSchema,
    weather: WeatherFieldSchema,
  })
  .transform(
    (fields): Item => ({
      category: fields.category,
      name: fields.name,
      color: fields.color,
      temperatureBand: fields.temperature,
      style: fields.style,
      weather: fields.weather,
    })
  );

/**
 * Raw string values for every catalog column.
 */
export type RawItemFields = Record<CatalogColumn, string>;

// ============================================================================
// Helpers
// ============================================================================

/**
 * Formats the first zod issue as `<field> <message>`.
 */
export function describeIssue(issue: ZodIssue | undefined): string {
  if (!issue) {
    return 'value is invalid';
  }
  const field = issue.path.join('.');
  return field ? `${field} ${issue.message}` : issue.message;
}

/**
 * Checks whether a record is the optional header line.
 */
export function isHeaderRecord(fields: readonly string[]): boolean {
  return (
    fields.length === CATALOG_COLUMNS.length &&
    fields.every((field, index) => field.trim().toLowerCase() === CATALOG_COLUMNS[index])
  );
}

/**
 * Converts an item into persisted column order.
 */
export function toRecord(item: Item): string[] {
  return [item.category, item.name, item.color, item.temperatureBand, item.style, item.weather];
}

// ============================================================================
// Parsers
// ============================================================================

/**
 * Parses one persisted record into an item.
 *
 * @param fields - Decoded CSV fields of the record
 * @param lineNumber - 1-based line number, used in the error
 * @throws {CatalogFormatError} If the column count or any value is invalid
 */
export function parseCatalogRecord(fields: readonly string[], lineNumber: number): Item {
  if (fields.length !== CATALOG_COLUMNS.length) {
    throw new CatalogFormatError(
      `Line ${lineNumber}: expected ${CATALOG_COLUMNS.length} columns, found ${fields.length}`,
      lineNumber
    );
  }

  const [category, name, color, temperature, style, weather] = fields;
  const result = RawItemSchema.safeParse({ category, name, color, temperature, style, weather });

  if (!result.success) {
    throw new CatalogFormatError(
      `Line ${lineNumber}: ${describeIssue(result.error.issues[0])}`,
      lineNumber
    );
  }

  return result.data;
}

/**
 * Parses values typed at the `add` prompt into an item.
 *
 * @throws {InvalidInputError} If any value is invalid
 */
export function parseItemInput(fields: RawItemFields): Item {
  const result = RawItemSchema.safeParse(fields);

  if (!result.success) {
    const issue = result.error.issues[0];
    throw new InvalidInputError(
      `Invalid input: ${describeIssue(issue)}`,
      issue ? issue.path.join('.') : 'item'
    );
  }

  return result.data;
}
