/**
 * Configuration Management
 *
 * Loads configuration from .eqiarc (YAML or JSON) with environment
 * variable overrides and defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Explicit overrides (command-line options)
 * 2. Environment variables (EQIA_*)
 * 3. Config file (.eqiarc or --config path)
 * 4. Default values
 *
 * @module core/config
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError, errorMessage } from './errors.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface NomisConfig {
  readonly baseUrl: string;
  readonly timeoutMs: number;
  readonly maxRetries: number;
  readonly initialDelayMs: number;
  readonly backoffMultiplier: number;
  /** Measures requested with every dataset query (count, percentage) */
  readonly measures: string;
}

/**
 * Reference data locations
 */
export interface PathsConfig {
  readonly registry: string;
  readonly lsoaLookup: string;
  readonly imd: string;
  readonly homelessness: string;
  readonly crime: string;
  readonly population: string;
}

export interface AppConfig {
  readonly nomis: NomisConfig;
  readonly paths: PathsConfig;
  readonly verbose: boolean;
  readonly json: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

/**
 * Config file structure
 */
const ConfigFileSchema = z
  .object({
    nomis: z
      .object({
        base_url: z.string().url(),
        timeout_ms: z.number().int().positive(),
        max_retries: z.number().int().min(0).max(10),
        initial_delay_ms: z.number().int().min(0),
        backoff_multiplier: z.number().min(1),
        measures: z.string().min(1),
      })
      .partial()
      .optional(),
    paths: z
      .object({
        registry: z.string(),
        lsoa_lookup: z.string(),
        imd: z.string(),
        homelessness: z.string(),
        crime: z.string(),
        population: z.string(),
      })
      .partial()
      .optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Defaults
// ============================================================================

/**
 * Bundled station registry shipped with the package
 */
export const BUNDLED_REGISTRY_PATH = fileURLToPath(
  new URL('../../data/stations.json', import.meta.url)
);

/**
 * Default CSV file names, resolved against EQIA_DATA_DIR or the cwd
 */
export const DEFAULT_DATA_FILES = {
  lsoaLookup: 'LSOA to WD to LA Lookup.csv',
  imd: 'IMD 2025.csv',
  homelessness: 'GLA Homelessness Data 23-25.csv',
  crime: 'BLE_Boroughs_Crime_Data.csv',
  population: 'BLE_Population Projections Data.csv',
} as const;

export const DEFAULT_NOMIS_CONFIG: NomisConfig = {
  baseUrl: 'https://www.nomisweb.co.uk/api/v01',
  timeoutMs: 30000,
  maxRetries: 2,
  initialDelayMs: 1000,
  backoffMultiplier: 3,
  measures: '20100,20301',
};

// ============================================================================
// Configuration Loading
// ============================================================================

const CONFIG_FILE_NAMES = ['.eqiarc', '.eqiarc.yaml', '.eqiarc.yml', '.eqiarc.json'];

/**
 * Find config file in the start directory or its parents
 */
export function findConfigFile(startDir: string): string | null {
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

/**
 * Parse and validate config file content (YAML is a superset of JSON)
 */
export function parseConfigContent(content: string, filePath: string | null): ConfigFile {
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (error) {
    throw new ConfigError(`Invalid config file syntax: ${errorMessage(error)}`, filePath);
  }

  const parsed = ConfigFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config file: ${issues}`, filePath);
  }
  return parsed.data;
}

function readConfigFile(filePath: string): ConfigFile {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read config file: ${errorMessage(error)}`, filePath);
  }
  return parseConfigContent(content, filePath);
}

type Env = Readonly<Record<string, string | undefined>>;

function getEnvNumber(env: Env, name: string): number | undefined {
  const value = env[`EQIA_${name}`];
  if (value === undefined) return undefined;
  const num = parseInt(value, 10);
  return isNaN(num) ? undefined : num;
}

export interface LoadConfigOptions {
  /** Explicit config file path; otherwise searched upward from cwd */
  readonly configPath?: string;
  readonly cwd?: string;
  readonly env?: Env;
  /** CLI flag overrides */
  readonly overrides?: {
    readonly verbose?: boolean;
    readonly json?: boolean;
    readonly timeoutMs?: number;
    readonly paths?: Partial<PathsConfig>;
  };
}

/**
 * Load configuration with full precedence chain
 *
 * @throws {ConfigError} If an explicit config path does not exist or a file is invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  let configPath: string | null = null;
  if (options.configPath) {
    configPath = resolve(cwd, options.configPath);
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`, configPath);
    }
  } else {
    configPath = findConfigFile(cwd);
  }

  const file: ConfigFile = configPath ? readConfigFile(configPath) : {};
  const dataDir = env.EQIA_DATA_DIR ? resolve(cwd, env.EQIA_DATA_DIR) : cwd;
  const fromData = (name: string): string => resolve(dataDir, name);
  const fromFile = (value: string | undefined): string | undefined =>
    value === undefined ? undefined : resolve(cwd, value);

  const nomis: NomisConfig = {
    baseUrl: env.EQIA_NOMIS_BASE_URL ?? file.nomis?.base_url ?? DEFAULT_NOMIS_CONFIG.baseUrl,
    timeoutMs:
      options.overrides?.timeoutMs ??
      getEnvNumber(env, 'TIMEOUT_MS') ??
      file.nomis?.timeout_ms ??
      DEFAULT_NOMIS_CONFIG.timeoutMs,
    maxRetries:
      getEnvNumber(env, 'MAX_RETRIES') ??
      file.nomis?.max_retries ??
      DEFAULT_NOMIS_CONFIG.maxRetries,
    initialDelayMs: file.nomis?.initial_delay_ms ?? DEFAULT_NOMIS_CONFIG.initialDelayMs,
    backoffMultiplier: file.nomis?.backoff_multiplier ?? DEFAULT_NOMIS_CONFIG.backoffMultiplier,
    measures: file.nomis?.measures ?? DEFAULT_NOMIS_CONFIG.measures,
  };

  const overridePaths = options.overrides?.paths ?? {};
  const paths: PathsConfig = {
    registry:
      overridePaths.registry ??
      (env.EQIA_REGISTRY ? resolve(cwd, env.EQIA_REGISTRY) : undefined) ??
      fromFile(file.paths?.registry) ??
      BUNDLED_REGISTRY_PATH,
    lsoaLookup:
      overridePaths.lsoaLookup ??
      fromFile(file.paths?.lsoa_lookup) ??
      fromData(DEFAULT_DATA_FILES.lsoaLookup),
    imd: overridePaths.imd ?? fromFile(file.paths?.imd) ?? fromData(DEFAULT_DATA_FILES.imd),
    homelessness:
      overridePaths.homelessness ??
      fromFile(file.paths?.homelessness) ??
      fromData(DEFAULT_DATA_FILES.homelessness),
    crime: overridePaths.crime ?? fromFile(file.paths?.crime) ?? fromData(DEFAULT_DATA_FILES.crime),
    population:
      overridePaths.population ??
      fromFile(file.paths?.population) ??
      fromData(DEFAULT_DATA_FILES.population),
  };

  return {
    nomis,
    paths,
    verbose: options.overrides?.verbose ?? false,
    json: options.overrides?.json ?? false,
    configPath,
  };
}
