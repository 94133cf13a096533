#!/usr/bin/env node
/**
 * Entry point for the outfit-picker CLI.
 *
 * Startup order: configuration, logger, catalog load, interactive session.
 * A catalog that cannot be read aborts startup with exit code 1.
 *
 * @module index
 */

import type { Readable, Writable } from 'node:stream';
import { getAppConfig, loadAppConfig, type AppConfig } from './core/config/env';
import { CatalogIOError, ConfigError, getErrorMessage } from './core/errors';
import { createLogger, type LogSink } from './core/logging/structuredLogger';
import { CsvCatalogRepository, type Item } from './features/catalog';
import type { RandomSource } from './features/recommendations';
import { ReadlinePrompter } from './cli/prompter';
import { runSession } from './cli/session';

export const APP_NAME = 'outfit-picker';

/**
 * Overrides for the process streams and environment.
 *
 * When `env` is given it is used as-is and no `.env` file is read.
 */
export interface MainOptions {
  input?: Readable;
  output?: Writable;
  errorOutput?: Writable;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  random?: RandomSource;
  logSink?: LogSink;
}

/**
 * Runs the CLI and resolves with the process exit code.
 */
export async function main(options: MainOptions = {}): Promise<number> {
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stdout;
  const errorOutput = options.errorOutput ?? process.stderr;

  let config: AppConfig;
  try {
    config = options.env ? getAppConfig(options.env, options.cwd) : loadAppConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      errorOutput.write(`${error.message}\n`);
      return 1;
    }
    throw error;
  }

  const logger = createLogger(APP_NAME, {
    environment: config.environment,
    minLevel: config.logLevel,
    sink: options.logSink,
  });
  const repository = new CsvCatalogRepository(config.catalogPath, logger);

  let catalog: Item[];
  try {
    ({ items: catalog } = await repository.load());
  } catch (error) {
    if (error instanceof CatalogIOError) {
      logger.error('catalog_load_failed', {
        catalog_path: error.filePath,
        error_code: 'IO_ERROR',
        error_message: getErrorMessage(error.originalError),
      });
      errorOutput.write(`${error.message}\n`);
      return 1;
    }
    throw error;
  }

  const prompter = new ReadlinePrompter(input, output);
  try {
    const result = await runSession(catalog, {
      prompter,
      repository,
      logger,
      random: options.random,
    });
    return result.exitCode;
  } finally {
    prompter.close();
  }
}

if (require.main === module) {
  main()
    .then((exitCode) => {
      process.exitCode = exitCode;
    })
    .catch((error: unknown) => {
      process.stderr.write(`${getErrorMessage(error)}\n`);
      process.exitCode = 1;
    });
}
