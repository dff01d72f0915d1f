/**
 * CLI Runtime Context
 *
 * Holds the resolved configuration and logger for the running command, maps
 * failures to exit codes, and opens/saves the place data file.
 *
 * @module cli/lib/context
 */

import { existsSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  DuplicatePlaceError,
  GeocodingError,
  InvalidCoordinateError,
  PlaceNotFoundError,
  PlaceValidationError,
} from '../../core/errors.js';
import {
  HTTPError,
  HTTPNetworkError,
  HTTPRetryExhaustedError,
  HTTPTimeoutError,
} from '../../core/http-client.js';
import { PlaceCatalog } from '../../services/place-catalog.js';
import type { CLIConfig } from './config.js';
import type { CLILogger, LogMetadata } from './logger.js';
import { readPlacesFile, writePlacesFile } from './ndjson.js';

// ============================================================================
// Exit Codes
// ============================================================================

export const EXIT_CODES = {
  SUCCESS: 0,
  ERRORS: 2,
  CONFIG_ERROR: 3,
  NETWORK_ERROR: 4,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Exit code for an error escaping a command
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (
    error instanceof GeocodingError ||
    error instanceof HTTPError ||
    error instanceof HTTPNetworkError ||
    error instanceof HTTPTimeoutError ||
    error instanceof HTTPRetryExhaustedError
  ) {
    return EXIT_CODES.NETWORK_ERROR;
  }
  return EXIT_CODES.ERRORS;
}

/**
 * Whether an error is caused by user input rather than a fault
 */
export function isUserError(error: unknown): boolean {
  return (
    error instanceof InvalidCoordinateError ||
    error instanceof PlaceValidationError ||
    error instanceof PlaceNotFoundError ||
    error instanceof DuplicatePlaceError
  );
}

// ============================================================================
// Global State
// ============================================================================

export interface GlobalContext {
  readonly config: CLIConfig;
  readonly logger: CLILogger;
  readonly startTime: number;
}

let globalContext: GlobalContext | null = null;

export function setGlobalContext(context: GlobalContext): void {
  globalContext = context;
}

export function getGlobalContext(): GlobalContext {
  if (!globalContext) {
    throw new Error('Global context not initialized. Call initializeContext first.');
  }
  return globalContext;
}

export function hasGlobalContext(): boolean {
  return globalContext !== null;
}

// ============================================================================
// Data File
// ============================================================================

/**
 * Bundled sample places, used while no data file exists
 */
export const SAMPLE_DATA_FILE = join(
  dirname(fileURLToPath(import.meta.url)),
  '..',
  '..',
  '..',
  'data',
  'sample-places.ndjson'
);

export interface OpenedCatalog {
  readonly catalog: PlaceCatalog;
  /** File the places were read from */
  readonly source: string;
  /** True when the configured data file was missing and the sample was used */
  readonly fromSample: boolean;
}

/**
 * Load the configured data file, or the bundled sample when it is missing
 */
export async function openCatalog(
  config: CLIConfig,
  logger: CLILogger,
  samplePath: string = SAMPLE_DATA_FILE
): Promise<OpenedCatalog> {
  if (existsSync(config.dataFile)) {
    const { records } = await readPlacesFile(config.dataFile);
    logger.debug('Loaded data file', { path: config.dataFile, places: records.length });
    return {
      catalog: PlaceCatalog.fromRecords(records),
      source: config.dataFile,
      fromSample: false,
    };
  }

  logger.warn('Data file not found, using sample places', { path: config.dataFile });
  const { records } = await readPlacesFile(samplePath);
  return { catalog: PlaceCatalog.fromRecords(records), source: samplePath, fromSample: true };
}

/**
 * Write the catalog back to the configured data file
 */
export async function saveCatalog(
  config: CLIConfig,
  logger: CLILogger,
  catalog: PlaceCatalog
): Promise<void> {
  await writePlacesFile(config.dataFile, catalog.toRecords(), 'kd-places data file');
  logger.debug('Saved data file', { path: config.dataFile, places: catalog.size });
}

// ============================================================================
// Command Execution
// ============================================================================

/**
 * Run a command body inside the global context
 *
 * Whatever the body returns is printed to stdout. Failures are logged and
 * turned into `process.exitCode` instead of exiting, so pending writes can
 * finish.
 */
export async function executeCommand(
  command: string,
  options: LogMetadata,
  body: (context: GlobalContext) => Promise<string | undefined>
): Promise<void> {
  const context = getGlobalContext();
  const { logger } = context;
  logger.commandStart(command, options);

  try {
    const output = await body(context);
    if (output !== undefined) {
      console.log(output);
    }
    logger.commandEnd(true);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    if (isUserError(error)) {
      logger.error(message);
    } else {
      logger.error(message, {
        error: error instanceof Error ? error.name : 'Unknown',
        ...(context.config.verbose && error instanceof Error ? { stack: error.stack } : {}),
      });
    }
    logger.commandEnd(false);
    process.exitCode = exitCodeFor(error);
  }
}
