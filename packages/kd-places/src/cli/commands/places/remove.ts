/**
 * Remove Command
 *
 * Remove one place by id and save the data file.
 *
 * Usage:
 *   kd-places remove <id>
 */

import type { Command } from 'commander';
import { PlaceNotFoundError } from '../../../core/errors.js';
import type { PlaceCatalog } from '../../../services/place-catalog.js';
import { executeCommand, openCatalog, saveCatalog } from '../../lib/context.js';
import { formatJson } from '../../lib/output.js';

/**
 * @throws {PlaceNotFoundError} If no place has this id
 */
export function runRemove(catalog: PlaceCatalog, id: string): void {
  if (!catalog.removePlace(id)) {
    throw new PlaceNotFoundError(id);
  }
}

/**
 * Register the remove command
 */
export function registerRemoveCommand(program: Command): void {
  program
    .command('remove')
    .description('Remove a place from the data file')
    .argument('<id>', 'Place id')
    .action(async (id: string) => {
      await executeCommand('remove', { id }, async ({ config, logger }) => {
        const { catalog } = await openCatalog(config, logger);
        runRemove(catalog, id);
        await saveCatalog(config, logger, catalog);

        return config.json
          ? formatJson({ success: true, id })
          : `Removed ${id} from ${config.dataFile}`;
      });
    });
}
