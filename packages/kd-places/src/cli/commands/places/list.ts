/**
 * List Command
 *
 * Print every place (or every place of one type) in insertion order.
 *
 * Usage:
 *   kd-places list [--type <type>] [--limit <n>] [--format <fmt>]
 */

import type { Command } from 'commander';
import type { PlaceCatalog } from '../../../services/place-catalog.js';
import { executeCommand, openCatalog } from '../../lib/context.js';
import { parseFormatOption, parsePositiveIntOption, resolveFormat } from '../../lib/options.js';
import { PLACE_COLUMNS, formatOutput, toPlaceRow, type OutputFormat } from '../../lib/output.js';

export interface ListOptions {
  readonly type?: string;
  readonly limit: number;
  readonly format: OutputFormat;
}

interface ListCliOptions {
  readonly type?: string;
  readonly limit?: number;
  readonly format?: OutputFormat;
}

export function runList(catalog: PlaceCatalog, options: ListOptions): string {
  const places = catalog.listPlaces(options.type).slice(0, options.limit);
  return formatOutput(places.map(toPlaceRow), options.format, PLACE_COLUMNS);
}

/**
 * Register the list command
 */
export function registerListCommand(program: Command): void {
  program
    .command('list')
    .description('List places')
    .option('-t, --type <type>', 'Only list places of this type')
    .option('-l, --limit <n>', 'Maximum rows', parsePositiveIntOption)
    .option('-f, --format <fmt>', 'Output format: table|json|ndjson|csv', parseFormatOption)
    .action(async (options: ListCliOptions) => {
      await executeCommand('list', { ...options }, async ({ config, logger }) => {
        const { catalog } = await openCatalog(config, logger);
        return runList(catalog, {
          type: options.type,
          limit: options.limit ?? config.search.limit,
          format: resolveFormat(options.format, config.json),
        });
      });
    });
}
