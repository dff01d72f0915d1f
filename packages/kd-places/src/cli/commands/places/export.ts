/**
 * Export Command
 *
 * Write places as a GeoJSON FeatureCollection for map viewers.
 *
 * Usage:
 *   kd-places export [--type <type>] [--out <file>]
 */

import type { Command } from 'commander';
import type { FeatureCollection, Point as GeoJSONPoint } from 'geojson';
import { placesToFeatureCollection, type PlaceFeatureProperties } from '../../../core/geo-utils.js';
import { atomicWriteJSON } from '../../../core/utils/atomic-write.js';
import type { PlaceCatalog } from '../../../services/place-catalog.js';
import { executeCommand, openCatalog } from '../../lib/context.js';
import { formatJson } from '../../lib/output.js';

interface ExportCliOptions {
  readonly type?: string;
  readonly out?: string;
}

export function runExport(
  catalog: PlaceCatalog,
  type?: string
): FeatureCollection<GeoJSONPoint, PlaceFeatureProperties> {
  return placesToFeatureCollection(catalog.listPlaces(type));
}

/**
 * Register the export command
 */
export function registerExportCommand(program: Command): void {
  program
    .command('export')
    .description('Export places as GeoJSON')
    .option('-t, --type <type>', 'Only export places of this type')
    .option('-o, --out <file>', 'Write to a file instead of stdout')
    .action(async (options: ExportCliOptions) => {
      await executeCommand('export', { ...options }, async ({ config, logger }) => {
        const { catalog } = await openCatalog(config, logger);
        const collection = runExport(catalog, options.type);

        if (!options.out) {
          return formatJson(collection);
        }

        await atomicWriteJSON(options.out, collection);
        logger.info('GeoJSON written', {
          path: options.out,
          features: collection.features.length,
        });
        return undefined;
      });
    });
}
