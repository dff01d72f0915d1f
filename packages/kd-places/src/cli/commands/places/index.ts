/**
 * Places Commands Index
 *
 * Registers the data file commands:
 * - list, types: inspect the catalog
 * - add, remove: edit the data file
 * - import: fill it from the geocoder
 * - export: GeoJSON for map viewers
 */

import type { Command } from 'commander';
import { registerAddCommand } from './add.js';
import { registerExportCommand } from './export.js';
import { registerImportCommand } from './import.js';
import { registerListCommand } from './list.js';
import { registerRemoveCommand } from './remove.js';
import { registerTypesCommand } from './types.js';

export { runAdd } from './add.js';
export { runExport } from './export.js';
export { createGeocoder, runImport } from './import.js';
export { runList } from './list.js';
export { runRemove } from './remove.js';
export { collectTypes, runTypes } from './types.js';

/**
 * Register all places commands on the program
 *
 * @param program - Commander program instance
 */
export function registerPlacesCommands(program: Command): void {
  registerListCommand(program);
  registerTypesCommand(program);
  registerAddCommand(program);
  registerRemoveCommand(program);
  registerImportCommand(program);
  registerExportCommand(program);
}
