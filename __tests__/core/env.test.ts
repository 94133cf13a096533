/**
 * @fileoverview Unit tests for environment configuration.
 *
 * @module __tests__/core/env
 */

import path from 'node:path';
import { DEFAULT_CATALOG_PATH, getAppConfig } from '../../src/core/config/env';
import { ConfigError } from '../../src/core/errors';

const CWD = path.resolve('/srv/wardrobe');

describe('getAppConfig', () => {
  it('applies defaults for an empty environment', () => {
    expect(getAppConfig({}, CWD)).toEqual({
      catalogPath: path.join(CWD, DEFAULT_CATALOG_PATH),
      logLevel: 'warn',
      environment: 'development',
    });
  });

  it('reads and normalises set values', () => {
    expect(
      getAppConfig(
        { CATALOG_PATH: 'data/closet.csv', LOG_LEVEL: ' INFO ', ENVIRONMENT: 'production' },
        CWD
      )
    ).toEqual({
      catalogPath: path.join(CWD, 'data', 'closet.csv'),
      logLevel: 'info',
      environment: 'production',
    });
  });

  it('keeps an absolute catalog path', () => {
    const absolute = path.resolve('/var/lib/items.csv');
    expect(getAppConfig({ CATALOG_PATH: absolute }, CWD).catalogPath).toBe(absolute);
  });

  it('treats empty values as unset', () => {
    expect(getAppConfig({ CATALOG_PATH: '', LOG_LEVEL: '' }, CWD)).toMatchObject({
      catalogPath: path.join(CWD, DEFAULT_CATALOG_PATH),
      logLevel: 'warn',
    });
  });

  it('falls back to development for an unknown environment', () => {
    expect(getAppConfig({ ENVIRONMENT: 'qa' }, CWD).environment).toBe('development');
  });

  it('rejects an unknown log level', () => {
    expect(() => getAppConfig({ LOG_LEVEL: 'verbose' }, CWD)).toThrow(ConfigError);
  });
});
