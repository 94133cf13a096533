/**
 * Structured logging module.
 *
 * Provides consistent, structured JSON logging for the CLI with support for
 * correlation IDs, environment tagging and a minimum log level.
 *
 * ARCHITECTURE:
 * - All logs are JSON-formatted for easy parsing by log tooling
 * - One correlation ID per interactive session ties its entries together
 * - Entries are written to a sink (stderr by default) so that stdout only
 *   carries the interactive dialogue
 *
 * PRIVACY REQUIREMENTS:
 * - NEVER log free-text user content (item names, colors)
 * - ONLY log operational metadata (counts, categories, durations, error codes)
 *
 * @module core/logging/structuredLogger
 */

import { v4 as uuidv4 } from 'uuid';

/**
 * Valid log levels for structured logging, lowest first.
 */
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Environment names for log tagging.
 */
export const ENVIRONMENTS = ['development', 'staging', 'production'] as const;

export type Environment = (typeof ENVIRONMENTS)[number];

/**
 * Base fields present in all log entries.
 */
export interface BaseLogEntry {
  /** ISO 8601 timestamp */
  timestamp: string;
  level: LogLevel;
  /** Event name for filtering/grouping */
  event: string;
  correlation_id: string;
  environment: Environment;
  /** Component that emitted the log */
  function_name: string;
}

/**
 * Extended log entry with optional operational metadata.
 */
export interface LogEntry extends BaseLogEntry {
  /** Operation duration in milliseconds */
  duration_ms?: number;
  /** Error code for categorization */
  error_code?: string;
  /** Error message (sanitized, no user content) */
  error_message?: string;
  /** Catalog file the entry refers to */
  catalog_path?: string;
  /** Number of items involved */
  item_count?: number;
  /** 1-based line number in the catalog file */
  line_number?: number;
  /** Additional safe metadata */
  metadata?: Record<string, string | number | boolean | null>;
}

export type LogData = Partial<Omit<LogEntry, keyof BaseLogEntry>>;

/**
 * Destination for formatted log lines.
 */
export type LogSink = (level: LogLevel, line: string) => void;

/**
 * Configuration for the structured logger.
 */
export interface LoggerConfig {
  functionName: string;
  correlationId: string;
  environment: Environment;
  /** Entries below this level are dropped */
  minLevel: LogLevel;
  sink: LogSink;
}

/**
 * Minimal logging surface accepted by the rest of the application.
 *
 * Both `StructuredLogger` and `ContextualLogger` satisfy it.
 */
export interface Logger {
  debug(event: string, data?: LogData): void;
  info(event: string, data?: LogData): void;
  warn(event: string, data?: LogData): void;
  error(event: string, data?: LogData): void;
}

/**
 * Generates a new correlation ID (UUID v4).
 */
export function generateCorrelationId(): string {
  return uuidv4();
}

/**
 * Default sink: one line per entry on stderr.
 */
export const stderrSink: LogSink = (_level, line) => {
  process.stderr.write(`${line}\n`);
};

/**
 * Returns true if `level` is at or above `minLevel`.
 */
export function isLevelEnabled(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(minLevel);
}

/**
 * Options for `createLogger`.
 */
export interface CreateLoggerOptions {
  correlationId?: string;
  environment?: Environment;
  minLevel?: LogLevel;
  sink?: LogSink;
}

/**
 * Creates a structured logger instance for a component.
 *
 * USAGE:
 * ```typescript
 * const logger = createLogger('outfit-picker', { minLevel: 'info' });
 *
 * logger.info('catalog_loaded', { item_count: 12, duration_ms: 3 });
 * ```
 *
 * @param functionName - Component name stamped on every entry
 * @param options - Optional overrides; a correlation ID is generated if absent
 */
export function createLogger(
  functionName: string,
  options: CreateLoggerOptions = {}
): StructuredLogger {
  return new StructuredLogger({
    functionName,
    correlationId: options.correlationId ?? generateCorrelationId(),
    environment: options.environment ?? 'development',
    minLevel: options.minLevel ?? 'warn',
    sink: options.sink ?? stderrSink,
  });
}

/**
 * Structured logger class for consistent JSON logging.
 *
 * Adds correlation ID, environment and component name to every entry.
 */
export class StructuredLogger implements Logger {
  private readonly config: LoggerConfig;

  constructor(config: LoggerConfig) {
    this.config = config;
  }

  get correlationId(): string {
    return this.config.correlationId;
  }

  get environment(): Environment {
    return this.config.environment;
  }

  get functionName(): string {
    return this.config.functionName;
  }

  /**
   * Logs a debug-level message.
   *
   * Use for detailed diagnostic information during development.
   */
  debug(event: string, data?: LogData): void {
    this.log('debug', event, data);
  }

  /**
   * Logs an info-level message.
   *
   * Use for normal operational events (catalog loaded, item appended, etc.).
   */
  info(event: string, data?: LogData): void {
    this.log('info', event, data);
  }

  /**
   * Logs a warn-level message.
   *
   * Use for unexpected but recoverable situations (skipped records, rejected input).
   */
  warn(event: string, data?: LogData): void {
    this.log('warn', event, data);
  }

  /**
   * Logs an error-level message.
   */
  error(event: string, data?: LogData): void {
    this.log('error', event, data);
  }

  private log(level: LogLevel, event: string, data?: LogData): void {
    if (!isLevelEnabled(level, this.config.minLevel)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      event,
      correlation_id: this.config.correlationId,
      environment: this.config.environment,
      function_name: this.config.functionName,
      ...data,
    };

    this.config.sink(level, `[${this.config.functionName}] ${JSON.stringify(entry)}`);
  }
}

/**
 * Creates a child logger with additional context.
 *
 * USAGE:
 * ```typescript
 * const catalogLogger = withContext(logger, { catalog_path: path });
 *
 * catalogLogger.info('catalog_loaded', { item_count: items.length });
 * ```
 */
export function withContext(logger: Logger, context: LogData): ContextualLogger {
  return new ContextualLogger(logger, context);
}

/**
 * Logger wrapper that adds consistent context to all log calls.
 */
export class ContextualLogger implements Logger {
  private readonly logger: Logger;
  private readonly context: LogData;

  constructor(logger: Logger, context: LogData) {
    this.logger = logger;
    this.context = context;
  }

  debug(event: string, data?: LogData): void {
    this.logger.debug(event, { ...this.context, ...data });
  }

  info(event: string, data?: LogData): void {
    this.logger.info(event, { ...this.context, ...data });
  }

  warn(event: string, data?: LogData): void {
    this.logger.warn(event, { ...this.context, ...data });
  }

  error(event: string, data?: LogData): void {
    this.logger.error(event, { ...this.context, ...data });
  }
}
