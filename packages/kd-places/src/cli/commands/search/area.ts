/**
 * Area Command
 *
 * List places within a great-circle radius of a coordinate, nearest first.
 *
 * Usage:
 *   kd-places area [--radius <km>] [--lon <deg> --lat <deg>] [--type <type>]
 *                  [--limit <n>] [--format <fmt>]
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
import { MATCH_COLUMNS, formatOutput, toPlaceRow, type OutputFormat } from '../../lib/output.js';

export interface AreaOptions {
  readonly lon: number;
  readonly lat: number;
  readonly radiusKm: number;
  readonly type?: string;
  readonly limit: number;
  readonly format: OutputFormat;
}

interface AreaCliOptions {
  readonly lon?: number;
  readonly lat?: number;
  readonly radius?: number;
  readonly type?: string;
  readonly limit?: number;
  readonly format?: OutputFormat;
}

export function runArea(catalog: PlaceCatalog, options: AreaOptions): string {
  const matches = catalog
    .searchInArea(options.lon, options.lat, options.radiusKm, options.type)
    .slice(0, options.limit);
  return formatOutput(matches.map(toPlaceRow), options.format, MATCH_COLUMNS);
}

/**
 * Register the area command
 */
export function registerAreaCommand(program: Command): void {
  program
    .command('area')
    .description('List places within a radius (km) of a coordinate')
    .option('-r, --radius <km>', 'Search radius in kilometres', parseNumberOption)
    .option('--lon <deg>', 'Longitude of the centre', parseNumberOption)
    .option('--lat <deg>', 'Latitude of the centre', parseNumberOption)
    .option('-t, --type <type>', 'Only include places of this type')
    .option('-l, --limit <n>', 'Maximum rows', parsePositiveIntOption)
    .option('-f, --format <fmt>', 'Output format: table|json|ndjson|csv', parseFormatOption)
    .action(async (options: AreaCliOptions) => {
      await executeCommand('area', { ...options }, async ({ config, logger }) => {
        const { catalog } = await openCatalog(config, logger);
        return runArea(catalog, {
          lon: options.lon ?? config.search.center.lon,
          lat: options.lat ?? config.search.center.lat,
          radiusKm: options.radius ?? config.search.radiusKm,
          type: options.type,
          limit: options.limit ?? config.search.limit,
          format: resolveFormat(options.format, config.json),
        });
      });
    });
}
