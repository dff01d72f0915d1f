/**
 * Types Command
 *
 * Print the distinct place types with their counts.
 *
 * Usage:
 *   kd-places types [--format <fmt>]
 */

import type { Command } from 'commander';
import type { PlaceCatalog } from '../../../services/place-catalog.js';
import { executeCommand, openCatalog } from '../../lib/context.js';
import { parseFormatOption, resolveFormat } from '../../lib/options.js';
import { formatOutput, type OutputFormat, type TableColumn } from '../../lib/output.js';

export type TypeRow = {
  readonly type: string;
  readonly count: number;
};

const TYPE_COLUMNS: readonly TableColumn[] = [
  { key: 'type', header: 'Type' },
  { key: 'count', header: 'Places', align: 'right' },
];

/**
 * Sorted type names with the number of places of each
 */
export function collectTypes(catalog: PlaceCatalog): TypeRow[] {
  return catalog
    .getPlaceTypes()
    .map((type) => ({ type, count: catalog.filterByType(type).length }));
}

export function runTypes(catalog: PlaceCatalog, format: OutputFormat): string {
  return formatOutput(collectTypes(catalog), format, TYPE_COLUMNS);
}

/**
 * Register the types command
 */
export function registerTypesCommand(program: Command): void {
  program
    .command('types')
    .description('List place types')
    .option('-f, --format <fmt>', 'Output format: table|json|ndjson|csv', parseFormatOption)
    .action(async (options: { readonly format?: OutputFormat }) => {
      await executeCommand('types', { ...options }, async ({ config, logger }) => {
        const { catalog } = await openCatalog(config, logger);
        return runTypes(catalog, resolveFormat(options.format, config.json));
      });
    });
}
