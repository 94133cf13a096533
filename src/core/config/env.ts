/**
 * Application configuration.
 *
 * Reads settings from environment variables, after loading a `.env` file
 * from the working directory when one exists.
 *
 * ENVIRONMENT VARIABLES:
 * - CATALOG_PATH: path to the catalog CSV file (default: items.csv)
 * - LOG_LEVEL: 'debug' | 'info' | 'warn' | 'error' (default: warn)
 * - ENVIRONMENT: 'development' | 'staging' | 'production' (default: development)
 *
 * @module core/config/env
 */

import path from 'node:path';
import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { ConfigError } from '../errors';
import {
  ENVIRONMENTS,
  LOG_LEVELS,
  type Environment,
  type LogLevel,
} from '../logging/structuredLogger';

/** Catalog file used when CATALOG_PATH is not set */
export const DEFAULT_CATALOG_PATH = 'items.csv';

export interface AppConfig {
  /** Absolute path to the catalog CSV file */
  catalogPath: string;
  logLevel: LogLevel;
  environment: Environment;
}

const EnvSchema = z.object({
  CATALOG_PATH: z.string().trim().min(1).default(DEFAULT_CATALOG_PATH),
  LOG_LEVEL: z.string().trim().toLowerCase().pipe(z.enum(LOG_LEVELS)).default('warn'),
  // Invalid values fall back to development
  ENVIRONMENT: z.enum(ENVIRONMENTS).catch('development'),
});

/**
 * Treats empty strings as unset, as shells commonly export `VAR=`.
 */
function withoutEmptyValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Builds the application configuration from an environment.
 *
 * @param env - Environment variables (default: process.env)
 * @param cwd - Directory relative catalog paths resolve against
 * @throws {ConfigError} If a variable holds an invalid value
 */
export function getAppConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): AppConfig {
  const result = EnvSchema.safeParse(withoutEmptyValues(env));

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  return {
    catalogPath: path.resolve(cwd, result.data.CATALOG_PATH),
    logLevel: result.data.LOG_LEVEL,
    environment: result.data.ENVIRONMENT,
  };
}

/**
 * Loads `.env` into process.env, then builds the configuration.
 *
 * Variables already set in the environment take precedence over `.env`.
 */
export function loadAppConfig(): AppConfig {
  loadDotenv();
  return getAppConfig(process.env);
}
