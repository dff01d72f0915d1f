/**
 * Box Command
 *
 * List places inside a lon/lat rectangle (edges included).
 *
 * Usage:
 *   kd-places box --min-lon <deg> --min-lat <deg> --max-lon <deg> --max-lat <deg>
 *                 [--type <type>] [--limit <n>] [--format <fmt>]
 */

import type { Command } from 'commander';
import type { PlaceCatalog } from '../../../services/place-catalog.js';
import { executeCommand, openCatalog } from '../../lib/context.js';
import {
  parseFormatOption,
  parseNumberOption,
  parsePositiveIntOption,
  resolveFormat,
} from '../../lib/options.js';
import { PLACE_COLUMNS, formatOutput, toPlaceRow, type OutputFormat } from '../../lib/output.js';

export interface BoxOptions {
  readonly minLon: number;
  readonly minLat: number;
  readonly maxLon: number;
  readonly maxLat: number;
  readonly type?: string;
  readonly limit: number;
  readonly format: OutputFormat;
}

interface BoxCliOptions {
  readonly minLon: number;
  readonly minLat: number;
  readonly maxLon: number;
  readonly maxLat: number;
  readonly type?: string;
  readonly limit?: number;
  readonly format?: OutputFormat;
}

/**
 * An inverted rectangle (min above max) simply matches nothing
 */
export function runBox(catalog: PlaceCatalog, options: BoxOptions): string {
  const places = catalog
    .searchInBox([options.minLon, options.minLat], [options.maxLon, options.maxLat], options.type)
    .slice(0, options.limit);
  return formatOutput(places.map(toPlaceRow), options.format, PLACE_COLUMNS);
}

/**
 * Register the box command
 */
export function registerBoxCommand(program: Command): void {
  program
    .command('box')
    .description('List places inside a lon/lat rectangle')
    .requiredOption('--min-lon <deg>', 'Western edge', parseNumberOption)
    .requiredOption('--min-lat <deg>', 'Southern edge', parseNumberOption)
    .requiredOption('--max-lon <deg>', 'Eastern edge', parseNumberOption)
    .requiredOption('--max-lat <deg>', 'Northern edge', parseNumberOption)
    .option('-t, --type <type>', 'Only include places of this type')
    .option('-l, --limit <n>', 'Maximum rows', parsePositiveIntOption)
    .option('-f, --format <fmt>', 'Output format: table|json|ndjson|csv', parseFormatOption)
    .action(async (options: BoxCliOptions) => {
      await executeCommand('box', { ...options }, async ({ config, logger }) => {
        const { catalog } = await openCatalog(config, logger);
        return runBox(catalog, {
          ...options,
          limit: options.limit ?? config.search.limit,
          format: resolveFormat(options.format, config.json),
        });
      });
    });
}
