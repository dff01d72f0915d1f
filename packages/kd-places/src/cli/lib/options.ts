/**
 * Option parsers for commander
 *
 * Commander hands option values over as strings; these turn them into
 * numbers and formats, raising `InvalidArgumentError` so commander prints
 * the usual "error: option '--lon <deg>' argument ..." message.
 *
 * @module cli/lib/options
 */

import { InvalidArgumentError } from 'commander';
import { OUTPUT_FORMATS, isOutputFormat, type OutputFormat } from './output.js';

export function parseNumberOption(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

export function parsePositiveIntOption(value: string): number {
  const parsed = parseNumberOption(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Not a positive integer.');
  }
  return parsed;
}

export function parseFormatOption(value: string): OutputFormat {
  if (!isOutputFormat(value)) {
    throw new InvalidArgumentError(`Expected one of: ${OUTPUT_FORMATS.join(', ')}.`);
  }
  return value;
}

/**
 * --json on the program wins over a command's --format
 */
export function resolveFormat(format: OutputFormat | undefined, json: boolean): OutputFormat {
  return json ? 'json' : (format ?? 'table');
}
