/**
 * NDJSON Utilities for Place Files
 *
 * Place files are NDJSON (newline-delimited JSON):
 * - Line 1: Header object with schema version, type, count, timestamp
 * - Lines 2+: One place record per line
 *
 * Every line is validated with zod; a bad line fails the whole load with
 * its line number.
 *
 * @module cli/lib/ndjson
 */

import { readFile } from 'fs/promises';
import { PLACES_SCHEMA_VERSION } from '../../core/constants.js';
import { atomicWriteFile } from '../../core/utils/atomic-write.js';
import { PlaceCatalog } from '../../services/place-catalog.js';
import {
  PlaceRecordSchema,
  PlacesHeaderSchema,
  formatValidationError,
  type PlaceRecord,
  type PlacesHeader,
} from '../../validation/schemas.js';

/**
 * Parsed place file
 */
export interface ParsedPlaces {
  readonly header: PlacesHeader;
  readonly records: PlaceRecord[];
  readonly source: string;
}

/**
 * Parse NDJSON place content
 *
 * @param content - Raw file content
 * @param source - File name used in error messages
 * @throws Error on an empty file, a bad header or an invalid record line
 */
export function parsePlacesContent(content: string, source: string): ParsedPlaces {
  const lines = content.split('\n');
  const firstLine = lines[0]?.trim() ?? '';

  if (!firstLine) {
    throw new Error(`NDJSON file is empty: ${source}`);
  }

  const header = PlacesHeaderSchema.safeParse(parseLine(firstLine, 1, source));
  if (!header.success) {
    throw new Error(
      `Invalid NDJSON header in ${source}: ${formatValidationError(header.error)}`
    );
  }

  const records: PlaceRecord[] = [];

  for (let i = 1; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) continue;

    const record = PlaceRecordSchema.safeParse(parseLine(line, i + 1, source));
    if (!record.success) {
      throw new Error(
        `Invalid place on line ${i + 1} in ${source}: ${formatValidationError(record.error)}`
      );
    }
    records.push(record.data);
  }

  return { header: header.data, records, source };
}

function parseLine(line: string, lineNumber: number, source: string): unknown {
  try {
    return JSON.parse(line);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to parse line ${lineNumber} in ${source}: ${reason}`);
  }
}

/**
 * Serialize place records to NDJSON (header first, trailing newline)
 *
 * Records are written in the order given so a reload rebuilds the index
 * with the same insertion order.
 */
export function serializePlaces(
  records: readonly PlaceRecord[],
  description: string,
  extractedAt: Date = new Date()
): string {
  const header: PlacesHeader = {
    _schema: PLACES_SCHEMA_VERSION,
    _type: 'Place',
    _count: records.length,
    _extracted: extractedAt.toISOString(),
    _description: description,
  };

  const lines = [JSON.stringify(header), ...records.map((record) => JSON.stringify(record))];
  return lines.join('\n') + '\n';
}

/**
 * Read and validate a place file
 */
export async function readPlacesFile(filepath: string): Promise<ParsedPlaces> {
  const content = await readFile(filepath, 'utf-8');
  return parsePlacesContent(content, filepath);
}

/**
 * Atomically write a place file
 */
export async function writePlacesFile(
  filepath: string,
  records: readonly PlaceRecord[],
  description: string
): Promise<void> {
  await atomicWriteFile(filepath, serializePlaces(records, description));
}

/**
 * Load a place file straight into a catalog
 */
export async function loadCatalog(filepath: string): Promise<PlaceCatalog> {
  const { records } = await readPlacesFile(filepath);
  return PlaceCatalog.fromRecords(records);
}
