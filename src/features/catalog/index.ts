/**
 * Catalog feature exports.
 *
 * @module features/catalog
 */

export * from './types';
export {
  RawItemSchema,
  isHeaderRecord,
  parseCatalogRecord,
  parseItemInput,
  toRecord,
  type RawItemFields,
} from './utils/itemValidation';
export {
  CsvCatalogRepository,
  encodeItem,
  type CatalogRepository,
  type LoadCatalogResult,
  type SkippedRecord,
} from './api/catalogRepository';
