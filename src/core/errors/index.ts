/**
 * Error classes shared across the application.
 *
 * Each class carries a `code` for classification and, where there is one,
 * the underlying error so callers can log the cause without parsing
 * messages.
 *
 * - CatalogIOError: the catalog file could not be read or written
 * - CatalogFormatError: a persisted record could not be turned into an item
 * - InvalidInputError: a value typed at the prompt was rejected
 * - ConfigError: environment configuration failed validation
 *
 * "No matching item" is not an error; selection returns null for it.
 *
 * @module core/errors
 */

/**
 * Catalog I/O failure codes.
 *
 * - read: file missing or unreadable during load
 * - write: append failed
 */
export type CatalogIOErrorCode = 'read' | 'write';

/**
 * Error thrown when the catalog file cannot be read or appended to.
 *
 * @example
 * ```ts
 * try {
 *   await repository.load();
 * } catch (error) {
 *   if (error instanceof CatalogIOError && error.code === 'read') {
 *     // abort startup
 *   }
 * }
 * ```
 */
export class CatalogIOError extends Error {
  constructor(
    message: string,
    public readonly code: CatalogIOErrorCode,
    public readonly filePath: string,
    public readonly originalError?: unknown
  ) {
    super(message);
    this.name = 'CatalogIOError';
  }
}

/**
 * Error describing a persisted record that could not be parsed.
 *
 * Raised per record by the record parser. The repository catches it, skips
 * the record and logs a warning, so it never escapes a load.
 */
export class CatalogFormatError extends Error {
  constructor(
    message: string,
    /** 1-based line number of the record in the catalog file */
    public readonly lineNumber: number
  ) {
    super(message);
    this.name = 'CatalogFormatError';
  }
}

/**
 * Error thrown when a value entered at the prompt is rejected.
 */
export class InvalidInputError extends Error {
  constructor(
    message: string,
    /** Name of the field that was rejected, e.g. `temperature` */
    public readonly field: string
  ) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

/**
 * Error thrown when environment configuration fails validation.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[]
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Extracts a loggable message from an unknown thrown value.
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Extracts a Node.js system error code (e.g. `ENOENT`) when present.
 */
export function getSystemErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}
