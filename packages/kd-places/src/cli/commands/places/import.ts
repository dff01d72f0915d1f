/**
 * Import Command
 *
 * Pull places of one type around a city from the geocoder and append them
 * to the data file.
 *
 * Usage:
 *   kd-places import --city <name> --type <type> [--limit <n>] [--span <deg>]
 *
 * Nominatim's usage policy allows one request per second; the command makes
 * two (city lookup, then search).
 */

import type { Command } from 'commander';
import type { Geocoder } from '../../../providers/nominatim-geocoder.js';
import { NominatimGeocoder } from '../../../providers/nominatim-geocoder.js';
import type { PlaceCatalog } from '../../../services/place-catalog.js';
import type { CLIConfig } from '../../lib/config.js';
import { executeCommand, openCatalog, saveCatalog } from '../../lib/context.js';
import { parseNumberOption, parsePositiveIntOption } from '../../lib/options.js';
import { formatJson } from '../../lib/output.js';

export interface ImportOptions {
  readonly city: string;
  readonly type: string;
  readonly limit?: number;
  readonly span?: number;
}

export interface ImportResult {
  readonly city: string;
  readonly type: string;
  readonly added: number;
  readonly total: number;
}

export async function runImport(
  catalog: PlaceCatalog,
  geocoder: Geocoder,
  options: ImportOptions
): Promise<ImportResult> {
  const added = await catalog.loadFromGeocoder(geocoder, {
    city: options.city,
    type: options.type,
    limit: options.limit,
    spanDegrees: options.span,
  });
  return { city: options.city, type: options.type, added, total: catalog.size };
}

/**
 * Geocoder built from the configured endpoint
 */
export function createGeocoder(config: CLIConfig): NominatimGeocoder {
  return new NominatimGeocoder({
    baseUrl: config.geocoder.baseUrl,
    http: {
      userAgent: config.geocoder.userAgent,
      timeoutMs: config.geocoder.timeout,
      maxRetries: config.geocoder.maxRetries,
    },
  });
}

/**
 * Register the import command
 */
export function registerImportCommand(program: Command): void {
  program
    .command('import')
    .description('Import places of one type around a city from OpenStreetMap Nominatim')
    .requiredOption('--city <name>', 'City to search around (e.g. Krasnoyarsk)')
    .requiredOption('--type <type>', 'Place type to search for (e.g. cafe)')
    .option('-l, --limit <n>', 'Maximum places requested', parsePositiveIntOption)
    .option('--span <deg>', 'Half-size of the search box in degrees', parseNumberOption)
    .action(async (options: ImportOptions) => {
      await executeCommand('import', { ...options }, async ({ config, logger }) => {
        const { catalog } = await openCatalog(config, logger);
        const result = await runImport(catalog, createGeocoder(config), options);

        if (result.added > 0) {
          await saveCatalog(config, logger, catalog);
        }

        return config.json
          ? formatJson({ success: true, ...result })
          : `Imported ${result.added} ${result.type} place(s) near ${result.city}; ${result.total} in total`;
      });
    });
}
