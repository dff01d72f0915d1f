/**
 * Add Command
 *
 * Add one place and save the data file.
 *
 * Usage:
 *   kd-places add --id <id> --name <name> --type <type> --lon <deg> --lat <deg>
 *                 [--address <text>]
 */

import type { Command } from 'commander';
import type { Place } from '../../../core/types.js';
import type { PlaceCatalog, PlaceInput } from '../../../services/place-catalog.js';
import { executeCommand, openCatalog, saveCatalog } from '../../lib/context.js';
import { parseNumberOption } from '../../lib/options.js';
import { formatJson } from '../../lib/output.js';

interface AddCliOptions {
  readonly id: string;
  readonly name: string;
  readonly type: string;
  readonly lon: number;
  readonly lat: number;
  readonly address?: string;
}

/**
 * Add a place to the catalog
 *
 * @throws {PlaceValidationError} If the record is invalid
 * @throws {DuplicatePlaceError} If the id is taken
 */
export function runAdd(catalog: PlaceCatalog, input: PlaceInput): Place {
  return catalog.addPlace(input);
}

/**
 * Register the add command
 */
export function registerAddCommand(program: Command): void {
  program
    .command('add')
    .description('Add a place to the data file')
    .requiredOption('--id <id>', 'Unique place id')
    .requiredOption('--name <name>', 'Display name')
    .requiredOption('--type <type>', 'Place type (e.g. cafe, pharmacy)')
    .requiredOption('--lon <deg>', 'Longitude', parseNumberOption)
    .requiredOption('--lat <deg>', 'Latitude', parseNumberOption)
    .option('--address <text>', 'Street address')
    .action(async (options: AddCliOptions) => {
      await executeCommand('add', { ...options }, async ({ config, logger }) => {
        const { catalog } = await openCatalog(config, logger);
        const place = runAdd(catalog, options);
        await saveCatalog(config, logger, catalog);

        return config.json
          ? formatJson({ success: true, place })
          : `Added ${place.id} (${place.name}) to ${config.dataFile}`;
      });
    });
}
