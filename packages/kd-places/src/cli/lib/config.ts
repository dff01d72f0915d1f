/**
 * kd-places CLI Configuration Management
 *
 * Loads configuration from .kd-placesrc (YAML) with environment variable
 * overrides and defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (KD_PLACES_*)
 * 3. Config file (.kd-placesrc or --config path)
 * 4. Default values
 *
 * @module cli/lib/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { DEFAULT_CENTER } from '../../core/constants.js';
import { formatValidationError } from '../../validation/schemas.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface CenterConfig {
  readonly lon: number;
  readonly lat: number;
}

export interface SearchDefaultsConfig {
  /** Default search centre when --lon/--lat are omitted */
  readonly center: CenterConfig;
  /** Default radius for area searches in km */
  readonly radiusKm: number;
  /** Default maximum number of rows printed */
  readonly limit: number;
}

export interface GeocoderConfig {
  readonly baseUrl: string;
  readonly userAgent: string;
  readonly timeout: number;
  readonly maxRetries: number;
}

/**
 * Full CLI configuration
 */
export interface CLIConfig {
  readonly version: number;

  /** Place data file (NDJSON) */
  readonly dataFile: string;

  readonly search: SearchDefaultsConfig;

  readonly geocoder: GeocoderConfig;

  // Runtime overrides (from CLI flags)
  readonly verbose: boolean;
  readonly json: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

/**
 * Config file structure (YAML)
 */
const ConfigFileSchema = z.object({
  version: z.number().optional(),
  data_file: z.string().optional(),
  search: z
    .object({
      center: z
        .object({ lon: z.number().optional(), lat: z.number().optional() })
        .optional(),
      radius_km: z.number().optional(),
      limit: z.number().optional(),
    })
    .optional(),
  geocoder: z
    .object({
      base_url: z.string().optional(),
      user_agent: z.string().optional(),
      timeout: z.number().optional(),
      max_retries: z.number().optional(),
    })
    .optional(),
});

type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: Omit<CLIConfig, 'verbose' | 'json' | 'configPath'> = {
  version: 1,
  dataFile: './data/places.ndjson',
  search: {
    center: { lon: DEFAULT_CENTER.lon, lat: DEFAULT_CENTER.lat },
    radiusKm: 2,
    limit: 50,
  },
  geocoder: {
    baseUrl: 'https://nominatim.openstreetmap.org',
    userAgent: 'kd-places/1.0',
    timeout: 30000,
    maxRetries: 2,
  },
};

// ============================================================================
// Configuration Loading
// ============================================================================

const CONFIG_FILE_NAMES = [
  '.kd-placesrc',
  '.kd-placesrc.yaml',
  '.kd-placesrc.yml',
  '.kd-placesrc.json',
];

/**
 * Find config file in the start directory or its parents
 */
function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }

    const parent = resolve(dir, '..');
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

function parseConfigFile(filePath: string): ConfigFile {
  const content = readFileSync(filePath, 'utf-8');
  const parsed: unknown = filePath.endsWith('.json') ? JSON.parse(content) : parseYaml(content);

  if (parsed === null || parsed === undefined) {
    return {};
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error(`Invalid config file ${filePath}: ${formatValidationError(result.error)}`);
  }
  return result.data;
}

function getEnvVar(env: NodeJS.ProcessEnv, name: string): string | undefined {
  return env[`KD_PLACES_${name}`];
}

function getEnvBool(env: NodeJS.ProcessEnv, name: string): boolean | undefined {
  const value = getEnvVar(env, name);
  if (value === undefined) return undefined;
  return value.toLowerCase() === 'true' || value === '1';
}

function getEnvNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const value = getEnvVar(env, name);
  if (value === undefined) return undefined;
  const num = parseFloat(value);
  return isNaN(num) ? undefined : num;
}

export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Directory to start the config file search from (default: cwd) */
  cwd?: string;
  /** Environment to read overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** CLI flag overrides */
  overrides?: {
    verbose?: boolean;
    json?: boolean;
    dataFile?: string;
  };
}

/**
 * Load and merge configuration from all sources
 *
 * @throws Error if an explicit config path does not exist or cannot be parsed
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<CLIConfig> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  let configPath: string | null = null;
  let fileConfig: ConfigFile = {};

  const explicitPath = options.configPath ?? getEnvVar(env, 'CONFIG');
  if (explicitPath) {
    configPath = resolve(cwd, explicitPath);
    if (!existsSync(configPath)) {
      throw new Error(`Config file not found: ${configPath}`);
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    configPath = findConfigFile(cwd);
    if (configPath) {
      fileConfig = parseConfigFile(configPath);
    }
  }

  const dataFile =
    options.overrides?.dataFile ??
    getEnvVar(env, 'DATA_FILE') ??
    fileConfig.data_file ??
    DEFAULT_CONFIG.dataFile;

  // Relative data paths are anchored at the config file, else at cwd
  const baseDir = configPath ? resolve(configPath, '..') : cwd;

  return {
    version: fileConfig.version ?? DEFAULT_CONFIG.version,

    dataFile: options.overrides?.dataFile ? resolve(cwd, dataFile) : resolve(baseDir, dataFile),

    search: {
      center: {
        lon:
          getEnvNumber(env, 'CENTER_LON') ??
          fileConfig.search?.center?.lon ??
          DEFAULT_CONFIG.search.center.lon,
        lat:
          getEnvNumber(env, 'CENTER_LAT') ??
          fileConfig.search?.center?.lat ??
          DEFAULT_CONFIG.search.center.lat,
      },
      radiusKm:
        getEnvNumber(env, 'RADIUS_KM') ??
        fileConfig.search?.radius_km ??
        DEFAULT_CONFIG.search.radiusKm,
      limit:
        getEnvNumber(env, 'LIMIT') ?? fileConfig.search?.limit ?? DEFAULT_CONFIG.search.limit,
    },

    geocoder: {
      baseUrl:
        getEnvVar(env, 'GEOCODER_URL') ??
        fileConfig.geocoder?.base_url ??
        DEFAULT_CONFIG.geocoder.baseUrl,
      userAgent: fileConfig.geocoder?.user_agent ?? DEFAULT_CONFIG.geocoder.userAgent,
      timeout:
        getEnvNumber(env, 'TIMEOUT') ??
        fileConfig.geocoder?.timeout ??
        DEFAULT_CONFIG.geocoder.timeout,
      maxRetries: fileConfig.geocoder?.max_retries ?? DEFAULT_CONFIG.geocoder.maxRetries,
    },

    verbose: options.overrides?.verbose ?? getEnvBool(env, 'VERBOSE') ?? false,
    json: options.overrides?.json ?? getEnvBool(env, 'JSON') ?? false,
    configPath,
  };
}

/**
 * Validate configuration
 *
 * @throws Error if configuration is invalid
 */
export function validateConfig(config: CLIConfig): void {
  if (config.version !== 1) {
    throw new Error(`Unsupported config version: ${config.version}. Expected 1.`);
  }

  const { lon, lat } = config.search.center;
  if (!Number.isFinite(lon) || lon < -180 || lon > 180) {
    throw new Error(`Search centre longitude out of range: ${lon}`);
  }
  if (!Number.isFinite(lat) || lat < -90 || lat > 90) {
    throw new Error(`Search centre latitude out of range: ${lat}`);
  }

  if (!(config.search.radiusKm > 0)) {
    throw new Error('Default radius must be a positive number of km');
  }

  if (!Number.isInteger(config.search.limit) || config.search.limit <= 0) {
    throw new Error('Default limit must be a positive integer');
  }

  if (config.geocoder.timeout <= 0) {
    throw new Error('Geocoder timeout must be a positive number');
  }

  if (!Number.isInteger(config.geocoder.maxRetries) || config.geocoder.maxRetries < 0) {
    throw new Error('Geocoder max retries must be a non-negative integer');
  }

  try {
    new URL(config.geocoder.baseUrl);
  } catch {
    throw new Error(`Invalid geocoder base URL: ${config.geocoder.baseUrl}`);
  }
}
