/**
 * CSV-backed catalog repository.
 *
 * Persists the catalog as a flat CSV file with the columns
 * `category,name,color,temperature,style,weather`, one record per line and
 * an optional header line. The file is append-only from this module's point
 * of view: existing lines are never rewritten.
 *
 * Failure policy:
 * - Unreadable or missing file on load: CatalogIOError ('read')
 * - Malformed record on load: skipped, reported in `skipped` and logged
 * - Failed append: CatalogIOError ('write'); earlier content is untouched
 *
 * @module features/catalog/api/catalogRepository
 */

import { appendFile, open, readFile, type FileHandle } from 'node:fs/promises';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import {
  CatalogFormatError,
  CatalogIOError,
  getErrorMessage,
  getSystemErrorCode,
} from '../../../core/errors';
import { withContext, type Logger } from '../../../core/logging/structuredLogger';
import { CATALOG_COLUMNS, type Item } from '../types';
import { isHeaderRecord, parseCatalogRecord, toRecord } from '../utils/itemValidation';

// ============================================================================
// Types
// ============================================================================

/**
 * A persisted record left out of the catalog during load.
 */
export interface SkippedRecord {
  /** 1-based line number in the catalog file */
  lineNumber: number;
  reason: string;
}

export interface LoadCatalogResult {
  /** Items in file order */
  items: Item[];
  skipped: SkippedRecord[];
}

/**
 * Persistence contract for the catalog.
 */
export interface CatalogRepository {
  /**
   * Reads every persisted record.
   *
   * @throws {CatalogIOError} If the file is missing or unreadable
   */
  load(): Promise<LoadCatalogResult>;

  /**
   * Writes one record at the end of the persisted catalog.
   *
   * @throws {CatalogIOError} If the write fails
   */
  append(item: Item): Promise<void>;
}

type FileTail = 'empty' | 'newline' | 'partial-line';

const UTF8_BOM = '\uFEFF';

// ============================================================================
// Helpers
// ============================================================================

/**
 * Decodes a single CSV line into its fields.
 *
 * @throws {CatalogFormatError} If the line is not valid CSV
 */
function decodeLine(line: string, lineNumber: number): string[] {
  let rows: string[][];
  try {
    rows = parse(line, { relax_column_count: true });
  } catch (error) {
    throw new CatalogFormatError(`Line ${lineNumber}: ${getErrorMessage(error)}`, lineNumber);
  }

  const [fields] = rows;
  if (!fields) {
    throw new CatalogFormatError(`Line ${lineNumber}: record is empty`, lineNumber);
  }
  return fields;
}

/**
 * Encodes an item as one newline-terminated CSV line.
 */
export function encodeItem(item: Item): string {
  return stringify([toRecord(item)]);
}

/**
 * Reports how the file ends, so an append never joins an unterminated line.
 *
 * A missing file reports 'empty'.
 */
async function inspectTail(filePath: string): Promise<FileTail> {
  let handle: FileHandle;
  try {
    handle = await open(filePath, 'r');
  } catch (error) {
    if (getSystemErrorCode(error) === 'ENOENT') {
      return 'empty';
    }
    throw error;
  }

  try {
    const { size } = await handle.stat();
    if (size === 0) {
      return 'empty';
    }
    const lastByte = Buffer.alloc(1);
    await handle.read(lastByte, 0, 1, size - 1);
    return lastByte[0] === 0x0a ? 'newline' : 'partial-line';
  } finally {
    await handle.close();
  }
}

// ============================================================================
// Repository
// ============================================================================

/**
 * Catalog repository reading and appending a CSV file.
 *
 * @example
 * ```ts
 * const repository = new CsvCatalogRepository('items.csv', logger);
 * const { items } = await repository.load();
 * await repository.append(newItem);
 * ```
 */
export class CsvCatalogRepository implements CatalogRepository {
  private readonly logger: Logger;

  constructor(
    public readonly filePath: string,
    logger: Logger
  ) {
    this.logger = withContext(logger, { catalog_path: filePath });
  }

  async load(): Promise<LoadCatalogResult> {
    const startedAt = Date.now();
    let content: string;

    try {
      content = await readFile(this.filePath, 'utf8');
    } catch (error) {
      throw new CatalogIOError(
        `Unable to read catalog file ${this.filePath}: ${getErrorMessage(error)}`,
        'read',
        this.filePath,
        error
      );
    }

    if (content.startsWith(UTF8_BOM)) {
      content = content.slice(UTF8_BOM.length);
    }

    const items: Item[] = [];
    const skipped: SkippedRecord[] = [];
    let seenRecord = false;

    content.split(/\r?\n/).forEach((line, index) => {
      const lineNumber = index + 1;
      if (line.trim() === '') {
        return;
      }

      try {
        const fields = decodeLine(line, lineNumber);
        const isFirstRecord = !seenRecord;
        seenRecord = true;

        if (isFirstRecord && isHeaderRecord(fields)) {
          return;
        }
        items.push(parseCatalogRecord(fields, lineNumber));
      } catch (error) {
        if (!(error instanceof CatalogFormatError)) {
          throw error;
        }
        seenRecord = true;
        skipped.push({ lineNumber, reason: error.message });
        this.logger.warn('catalog_record_skipped', {
          line_number: lineNumber,
          error_code: 'FORMAT_ERROR',
          error_message: error.message,
        });
      }
    });

    this.logger.info('catalog_loaded', {
      item_count: items.length,
      duration_ms: Date.now() - startedAt,
      metadata: { skipped_count: skipped.length },
    });

    return { items, skipped };
  }

  async append(item: Item): Promise<void> {
    try {
      const tail = await inspectTail(this.filePath);
      const prefix =
        tail === 'empty'
          ? stringify([[...CATALOG_COLUMNS]])
          : tail === 'partial-line'
            ? '\n'
            : '';

      await appendFile(this.filePath, `${prefix}${encodeItem(item)}`, 'utf8');
    } catch (error) {
      this.logger.error('catalog_append_failed', {
        error_code: getSystemErrorCode(error) ?? 'WRITE_ERROR',
        error_message: getErrorMessage(error),
      });
      throw new CatalogIOError(
        `Unable to append to catalog file ${this.filePath}: ${getErrorMessage(error)}`,
        'write',
        this.filePath,
        error
      );
    }

    this.logger.info('catalog_item_appended', {
      metadata: { category: item.category },
    });
  }
}
