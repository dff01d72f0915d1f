/**
 * Nearest Command
 *
 * Find the place closest to a coordinate.
 *
 * Usage:
 *   kd-places nearest [--lon <deg> --lat <deg>] [--type <type>] [--format <fmt>]
 *
 * The search centre defaults to the configured centre.
 */

import type { Command } from 'commander';
import type { PlaceCatalog } from '../../../services/place-catalog.js';
import { executeCommand, openCatalog } from '../../lib/context.js';
import { parseFormatOption, parseNumberOption, resolveFormat } from '../../lib/options.js';
import { MATCH_COLUMNS, formatOutput, toPlaceRow, type OutputFormat } from '../../lib/output.js';

export interface NearestOptions {
  readonly lon: number;
  readonly lat: number;
  readonly type?: string;
  readonly format: OutputFormat;
}

interface NearestCliOptions {
  readonly lon?: number;
  readonly lat?: number;
  readonly type?: string;
  readonly format?: OutputFormat;
}

/**
 * Render the nearest match in the requested format
 */
export function runNearest(catalog: PlaceCatalog, options: NearestOptions): string {
  const match = catalog.findNearest(options.lon, options.lat, options.type);
  const rows = match ? [toPlaceRow(match)] : [];
  return formatOutput(rows, options.format, MATCH_COLUMNS);
}

/**
 * Register the nearest command
 */
export function registerNearestCommand(program: Command): void {
  program
    .command('nearest')
    .description('Find the nearest place to a coordinate')
    .option('--lon <deg>', 'Longitude of the search point', parseNumberOption)
    .option('--lat <deg>', 'Latitude of the search point', parseNumberOption)
    .option('-t, --type <type>', 'Only consider places of this type')
    .option('-f, --format <fmt>', 'Output format: table|json|ndjson|csv', parseFormatOption)
    .action(async (options: NearestCliOptions) => {
      await executeCommand('nearest', { ...options }, async ({ config, logger }) => {
        const { catalog } = await openCatalog(config, logger);
        return runNearest(catalog, {
          lon: options.lon ?? config.search.center.lon,
          lat: options.lat ?? config.search.center.lat,
          type: options.type,
          format: resolveFormat(options.format, config.json),
        });
      });
    });
}
