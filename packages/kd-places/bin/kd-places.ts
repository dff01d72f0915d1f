#!/usr/bin/env tsx
/**
 * kd-places CLI Entry Point
 *
 * Query and edit a catalog of named places held in a 2-D k-d tree.
 *
 * @module kd-places-cli
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { registerPlacesCommands, registerSearchCommands } from '../src/cli/commands/index.js';
import { loadConfig, validateConfig } from '../src/cli/lib/config.js';
import {
  EXIT_CODES,
  getGlobalContext,
  hasGlobalContext,
  setGlobalContext,
  type GlobalContext,
} from '../src/cli/lib/context.js';
import { createCLILogger } from '../src/cli/lib/logger.js';
import { setLogWriter } from '../src/core/utils/logger.js';

// ============================================================================
// CLI Setup
// ============================================================================

interface GlobalOptions {
  readonly verbose?: boolean;
  readonly json?: boolean;
  readonly config?: string;
  readonly data?: string;
}

function getVersion(): string {
  const __dirname = dirname(fileURLToPath(import.meta.url));
  const packageJsonPath = join(__dirname, '..', 'package.json');
  try {
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}

async function initializeContext(options: GlobalOptions): Promise<GlobalContext> {
  const startTime = Date.now();

  const config = await loadConfig({
    configPath: options.config,
    overrides: {
      verbose: options.verbose,
      json: options.json,
      dataFile: options.data,
    },
  });
  validateConfig(config);

  const logger = createCLILogger({
    level: config.verbose ? 'debug' : 'info',
    json: config.json,
  });

  // Catalog, geocoder and HTTP logging follow the CLI's level and format
  setLogWriter(logger);

  const context = { config, logger, startTime };
  setGlobalContext(context);
  return context;
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('kd-places')
    .description('kd-places CLI - nearest, radius and rectangle search over named places')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .kd-placesrc)')
    .option('--data <path>', 'Place data file (NDJSON)')
    .hook('preAction', async (thisCommand) => {
      const options: GlobalOptions = thisCommand.opts();
      try {
        await initializeContext(options);
      } catch (error) {
        console.error(
          `Configuration error: ${error instanceof Error ? error.message : String(error)}`
        );
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }
    });

  registerSearchCommands(program);
  registerPlacesCommands(program);

  return program;
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (hasGlobalContext()) {
      const { logger, startTime } = getGlobalContext();
      logger.error('Command failed', {
        error: error instanceof Error ? error.message : String(error),
        duration_ms: Date.now() - startTime,
      });
    } else {
      console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    }
    process.exit(EXIT_CODES.ERRORS);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.ERRORS);
});
