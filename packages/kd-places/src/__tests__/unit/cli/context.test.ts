/**
 * CLI Context Tests
 */

import { describe, it, expect, afterEach } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { InvalidArgumentError } from 'commander';
import { DEFAULT_CONFIG, type CLIConfig } from '../../../cli/lib/config.js';
import {
  EXIT_CODES,
  exitCodeFor,
  openCatalog,
  saveCatalog,
} from '../../../cli/lib/context.js';
import { createCLILogger } from '../../../cli/lib/logger.js';
import {
  parseFormatOption,
  parseNumberOption,
  parsePositiveIntOption,
  resolveFormat,
} from '../../../cli/lib/options.js';
import { DuplicatePlaceError, GeocodingError } from '../../../core/errors.js';
import { HTTPTimeoutError } from '../../../core/http-client.js';

const quietLogger = createCLILogger({ level: 'error' }, () => undefined);

function configFor(dataFile: string): CLIConfig {
  return { ...DEFAULT_CONFIG, dataFile, verbose: false, json: false, configPath: null };
}

describe('openCatalog', () => {
  let dir: string | null = null;

  afterEach(async () => {
    if (dir) {
      await rm(dir, { recursive: true, force: true });
      dir = null;
    }
  });

  it('falls back to the sample places when the data file is missing', async () => {
    dir = await mkdtemp(join(tmpdir(), 'kd-places-context-'));

    const opened = await openCatalog(configFor(join(dir, 'places.ndjson')), quietLogger);

    expect(opened.fromSample).toBe(true);
    expect(opened.catalog.size).toBe(8);
  });

  it('reads the data file once it has been saved', async () => {
    dir = await mkdtemp(join(tmpdir(), 'kd-places-context-'));
    const config = configFor(join(dir, 'places.ndjson'));

    const { catalog } = await openCatalog(config, quietLogger);
    catalog.removePlace('shop-1');
    await saveCatalog(config, quietLogger, catalog);

    const reopened = await openCatalog(config, quietLogger);
    expect(reopened.fromSample).toBe(false);
    expect(reopened.source).toBe(config.dataFile);
    expect(reopened.catalog.size).toBe(7);
    expect(reopened.catalog.getPlace('shop-1')).toBeUndefined();
  });
});

describe('exitCodeFor', () => {
  it('maps network failures to the network exit code', () => {
    expect(exitCodeFor(new GeocodingError('down', 'cafe'))).toBe(EXIT_CODES.NETWORK_ERROR);
    expect(exitCodeFor(new HTTPTimeoutError('https://geocoder.test', 10))).toBe(
      EXIT_CODES.NETWORK_ERROR
    );
  });

  it('maps everything else to the generic error code', () => {
    expect(exitCodeFor(new DuplicatePlaceError('cafe-1'))).toBe(EXIT_CODES.ERRORS);
    expect(exitCodeFor('boom')).toBe(EXIT_CODES.ERRORS);
  });
});

describe('option parsers', () => {
  it('parses numbers', () => {
    expect(parseNumberOption('92.88')).toBe(92.88);
    expect(parseNumberOption('-1e-3')).toBe(-0.001);
    expect(() => parseNumberOption('abc')).toThrow(InvalidArgumentError);
    expect(() => parseNumberOption(' ')).toThrow(InvalidArgumentError);
  });

  it('parses positive integers', () => {
    expect(parsePositiveIntOption('20')).toBe(20);
    expect(() => parsePositiveIntOption('0')).toThrow('Not a positive integer.');
    expect(() => parsePositiveIntOption('2.5')).toThrow('Not a positive integer.');
  });

  it('parses output formats', () => {
    expect(parseFormatOption('ndjson')).toBe('ndjson');
    expect(() => parseFormatOption('xml')).toThrow('Expected one of: table, json, ndjson, csv.');
  });

  it('lets --json win over --format', () => {
    expect(resolveFormat('csv', true)).toBe('json');
    expect(resolveFormat(undefined, false)).toBe('table');
  });
});
