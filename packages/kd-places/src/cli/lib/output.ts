/**
 * Output Formatting for CLI Commands
 *
 * Place listings and search results rendered as table, json, ndjson or csv.
 *
 * @module cli/lib/output
 */

import type { Place, PlaceMatch } from '../../core/types.js';

/**
 * Output format options
 */
export type OutputFormat = 'table' | 'json' | 'ndjson' | 'csv';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['table', 'json', 'ndjson', 'csv'];

/**
 * Column definition for table and csv output
 */
export interface TableColumn {
  readonly key: string;
  readonly header: string;
  readonly width?: number;
  readonly align?: 'left' | 'right' | 'center';
  readonly formatter?: (value: unknown) => string;
}

/**
 * Flat row shape shared by every place-bearing command
 */
export type PlaceRow = {
  readonly id: string;
  readonly name: string;
  readonly type: string;
  readonly lon: number;
  readonly lat: number;
  readonly address: string;
  readonly distanceKm?: number;
};

export function isOutputFormat(value: string): value is OutputFormat {
  return (OUTPUT_FORMATS as readonly string[]).includes(value);
}

/**
 * Format data as a table
 */
export function formatTable<T extends Record<string, unknown>>(
  data: readonly T[],
  columns: readonly TableColumn[]
): string {
  if (data.length === 0) {
    return 'No places found.';
  }

  const widths = columns.map((col) => {
    if (col.width) return col.width;

    const maxDataWidth = Math.max(...data.map((row) => formatCell(row, col).length));
    return Math.max(col.header.length, maxDataWidth);
  });

  const headerRow = columns
    .map((col, i) => padCell(col.header, widths[i], col.align ?? 'left'))
    .join(' | ');

  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');

  const dataRows = data.map((row) =>
    columns
      .map((col, i) => padCell(formatCell(row, col), widths[i], col.align ?? 'left'))
      .join(' | ')
      .trimEnd()
  );

  return [headerRow.trimEnd(), separator, ...dataRows].join('\n');
}

function formatCell(row: Record<string, unknown>, col: TableColumn): string {
  const value = row[col.key];
  return col.formatter ? col.formatter(value) : String(value ?? '');
}

/**
 * Pad a cell value to the specified width
 */
function padCell(value: string, width: number, align: 'left' | 'right' | 'center'): string {
  const truncated = value.length > width ? value.slice(0, width - 1) + '~' : value;

  switch (align) {
    case 'right':
      return truncated.padStart(width);
    case 'center': {
      const padding = width - truncated.length;
      const leftPad = Math.floor(padding / 2);
      return ' '.repeat(leftPad) + truncated + ' '.repeat(padding - leftPad);
    }
    default:
      return truncated.padEnd(width);
  }
}

/**
 * Format data as JSON
 */
export function formatJson<T>(data: T, pretty = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

/**
 * Format data as NDJSON
 */
export function formatNdjson<T>(data: readonly T[]): string {
  return data.map((item) => JSON.stringify(item)).join('\n');
}

/**
 * Format data as CSV
 */
export function formatCsv<T extends Record<string, unknown>>(
  data: readonly T[],
  columns: readonly TableColumn[]
): string {
  const headerRow = columns.map((c) => escapeCSV(c.header)).join(',');

  const dataRows = data.map((row) =>
    columns.map((col) => escapeCSV(formatCell(row, col))).join(',')
  );

  return [headerRow, ...dataRows].join('\n');
}

/**
 * Escape a value for CSV output
 */
function escapeCSV(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Format data in the specified format
 */
export function formatOutput<T extends Record<string, unknown>>(
  data: readonly T[],
  format: OutputFormat,
  columns: readonly TableColumn[]
): string {
  switch (format) {
    case 'json':
      return formatJson(data);
    case 'ndjson':
      return formatNdjson(data);
    case 'csv':
      return formatCsv(data, columns);
    case 'table':
    default:
      return formatTable(data, columns);
  }
}

// ============================================================================
// Place Rows
// ============================================================================

/**
 * Flatten a place or a search match into an output row
 */
export function toPlaceRow(item: Place | PlaceMatch): PlaceRow {
  if ('place' in item) {
    return { ...item.place, distanceKm: item.distanceKm };
  }
  return { ...item };
}

/**
 * Common column formatters
 */
export const formatters = {
  /**
   * Distance in km with metre precision
   */
  km: (value: unknown): string => {
    if (typeof value !== 'number') return '-';
    return value.toFixed(3);
  },

  /**
   * Coordinate with six decimals (~10 cm)
   */
  coordinate: (value: unknown): string => {
    if (typeof value !== 'number') return '-';
    return value.toFixed(6);
  },

  /**
   * Truncate a string to max length
   */
  truncate:
    (maxLength: number) =>
    (value: unknown): string => {
      const str = String(value ?? '');
      return str.length > maxLength ? str.slice(0, maxLength - 3) + '...' : str;
    },
};

export const PLACE_COLUMNS: readonly TableColumn[] = [
  { key: 'id', header: 'ID' },
  { key: 'name', header: 'Name' },
  { key: 'type', header: 'Type' },
  { key: 'lon', header: 'Lon', align: 'right', formatter: formatters.coordinate },
  { key: 'lat', header: 'Lat', align: 'right', formatter: formatters.coordinate },
  { key: 'address', header: 'Address', formatter: formatters.truncate(40) },
];

export const MATCH_COLUMNS: readonly TableColumn[] = [
  ...PLACE_COLUMNS.slice(0, 5),
  { key: 'distanceKm', header: 'Distance (km)', align: 'right', formatter: formatters.km },
  PLACE_COLUMNS[5],
];
