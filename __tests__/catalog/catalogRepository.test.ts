/**
 * @fileoverview Tests for the CSV catalog repository.
 *
 * Each test works on a file in its own temporary directory.
 *
 * Covers:
 * - Header and header-free files
 * - Skip-and-warn for malformed records
 * - Missing file on load
 * - Append-only writes, including files without a trailing newline
 * - Append followed by a fresh load
 *
 * @module __tests__/catalog/catalogRepository
 */

import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { CatalogIOError } from '../../src/core/errors';
import {
  CsvCatalogRepository,
  encodeItem,
} from '../../src/features/catalog/api/catalogRepository';
import { makeItem, RecordingLogger } from '../testUtils';

const HEADER = 'category,name,color,temperature,style,weather\n';

describe('CsvCatalogRepository', () => {
  let tempDir: string;
  let filePath: string;
  let logger: RecordingLogger;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), 'outfit-catalog-'));
    filePath = path.join(tempDir, 'items.csv');
    logger = new RecordingLogger();
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  describe('load', () => {
    it('skips the header line', async () => {
      await writeFile(
        filePath,
        `${HEADER}jacket,Parka,Blue,cold,casual,rainy\nshirt,Tee,White,hot,casual,sunny\n`
      );

      const { items, skipped } = await new CsvCatalogRepository(filePath, logger).load();

      expect(items).toEqual([
        makeItem({ category: 'jacket', name: 'Parka', color: 'Blue', temperatureBand: 'cold', weather: 'rainy' }),
        makeItem(),
      ]);
      expect(skipped).toEqual([]);
    });

    it('loads a header-free file', async () => {
      await writeFile(filePath, 'shirt,Tee,White,hot,casual,sunny');

      const { items } = await new CsvCatalogRepository(filePath, logger).load();

      expect(items).toEqual([makeItem()]);
    });

    it('ignores blank lines, CRLF endings and a byte order mark', async () => {
      await writeFile(
        filePath,
        `\uFEFF${HEADER.trimEnd()}\r\n\r\nshirt,Tee,White,hot,casual,sunny\r\n\r\n`
      );

      const { items, skipped } = await new CsvCatalogRepository(filePath, logger).load();

      expect(items).toEqual([makeItem()]);
      expect(skipped).toEqual([]);
    });

    it('decodes quoted fields', async () => {
      await writeFile(filePath, `${HEADER}shirt,"Tee, striped","Navy ""Deep""",hot,casual,sunny\n`);

      const { items } = await new CsvCatalogRepository(filePath, logger).load();

      expect(items).toEqual([makeItem({ name: 'Tee, striped', color: 'Navy "Deep"' })]);
    });

    it('skips malformed records with their line numbers and keeps the rest', async () => {
      await writeFile(
        filePath,
        [
          'category,name,color,temperature,style,weather',
          'jacket,Parka,Blue,cold,casual,rainy',
          'shirt,Tee,White,hot,casual',
          'pants,Chinos,Beige,warm,casual,sunny',
          'shoes,Boots,Brown,cold,casual,rainy',
          '',
        ].join('\n')
      );

      const { items, skipped } = await new CsvCatalogRepository(filePath, logger).load();

      expect(items.map((item) => item.name)).toEqual(['Parka', 'Boots']);
      expect(skipped).toEqual([
        { lineNumber: 3, reason: 'Line 3: expected 6 columns, found 5' },
        { lineNumber: 4, reason: 'Line 4: temperature must be one of cold, medium, hot' },
      ]);
      expect(logger.entries.filter((entry) => entry.event === 'catalog_record_skipped')).toHaveLength(2);
      expect(logger.entries[0]).toEqual({
        level: 'warn',
        event: 'catalog_record_skipped',
        data: {
          catalog_path: filePath,
          line_number: 3,
          error_code: 'FORMAT_ERROR',
          error_message: 'Line 3: expected 6 columns, found 5',
        },
      });
    });

    it('skips a record with an unterminated quote', async () => {
      await writeFile(filePath, 'shirt,"Tee,White,hot,casual,sunny\nshirt,Tee,White,hot,casual,sunny\n');

      const { items, skipped } = await new CsvCatalogRepository(filePath, logger).load();

      expect(items).toEqual([makeItem()]);
      expect(skipped.map((record) => record.lineNumber)).toEqual([1]);
    });

    it('throws a read CatalogIOError when the file is missing', async () => {
      const repository = new CsvCatalogRepository(path.join(tempDir, 'missing.csv'), logger);

      await expect(repository.load()).rejects.toBeInstanceOf(CatalogIOError);
      await expect(repository.load()).rejects.toMatchObject({ code: 'read' });
    });

    it('logs the loaded item count', async () => {
      await writeFile(filePath, `${HEADER}shirt,Tee,White,hot,casual,sunny\n`);

      await new CsvCatalogRepository(filePath, logger).load();

      const loaded = logger.entries.find((entry) => entry.event === 'catalog_loaded');
      expect(loaded?.level).toBe('info');
      expect(loaded?.data?.item_count).toBe(1);
      expect(loaded?.data?.metadata).toEqual({ skipped_count: 0 });
    });
  });

  describe('append', () => {
    it('adds one line without touching existing content', async () => {
      const existing = `${HEADER}jacket,Parka,Blue,cold,casual,rainy\n`;
      await writeFile(filePath, existing);

      await new CsvCatalogRepository(filePath, logger).append(makeItem());

      expect(await readFile(filePath, 'utf8')).toBe(`${existing}shirt,Tee,White,hot,casual,sunny\n`);
    });

    it('starts a new line when the file lacks a trailing newline', async () => {
      await writeFile(filePath, `${HEADER}jacket,Parka,Blue,cold,casual,rainy`);

      await new CsvCatalogRepository(filePath, logger).append(makeItem());

      expect(await readFile(filePath, 'utf8')).toBe(
        `${HEADER}jacket,Parka,Blue,cold,casual,rainy\nshirt,Tee,White,hot,casual,sunny\n`
      );
    });

    it('writes the header first into an empty or missing file', async () => {
      await writeFile(filePath, '');
      await new CsvCatalogRepository(filePath, logger).append(makeItem());
      expect(await readFile(filePath, 'utf8')).toBe(`${HEADER}shirt,Tee,White,hot,casual,sunny\n`);

      const freshPath = path.join(tempDir, 'fresh.csv');
      await new CsvCatalogRepository(freshPath, logger).append(makeItem());
      expect(await readFile(freshPath, 'utf8')).toBe(`${HEADER}shirt,Tee,White,hot,casual,sunny\n`);
    });

    it('is visible exactly once to a fresh load, after the prior records in order', async () => {
      await writeFile(
        filePath,
        `${HEADER}jacket,Parka,Blue,cold,casual,rainy\npants,Chinos,Beige,medium,casual,sunny\n`
      );
      const added = makeItem({ name: 'Tee, striped', color: 'Navy' });

      await new CsvCatalogRepository(filePath, logger).append(added);
      const { items } = await new CsvCatalogRepository(filePath, new RecordingLogger()).load();

      expect(items.map((item) => item.name)).toEqual(['Parka', 'Chinos', 'Tee, striped']);
      expect(items.filter((item) => item.name === 'Tee, striped')).toEqual([added]);
    });

    it('throws a write CatalogIOError and logs when the path cannot be written', async () => {
      const directoryPath = path.join(tempDir, 'a-directory');
      await mkdir(directoryPath);
      const repository = new CsvCatalogRepository(directoryPath, logger);

      await expect(repository.append(makeItem())).rejects.toMatchObject({
        name: 'CatalogIOError',
        code: 'write',
        filePath: directoryPath,
      });
      expect(logger.events()).toEqual(['catalog_append_failed']);
    });
  });

  describe('encodeItem', () => {
    it('quotes fields containing commas', () => {
      expect(encodeItem(makeItem({ name: 'Tee, striped' }))).toBe(
        'shirt,"Tee, striped",White,hot,casual,sunny\n'
      );
    });
  });
});
