/**
 * CLI context and exit codes
 *
 * The entry point loads configuration once in a preAction hook; commands
 * read it back through getCliContext().
 *
 * @module cli/lib/context
 */

import { InvalidArgumentError } from 'commander';
import { loadConfig, type AppConfig } from '../../core/config.js';
import {
  ConfigError,
  DataSourceError,
  RegistryValidationError,
} from '../../core/errors.js';
import { setLogLevel } from '../../core/utils/logger.js';
import { createNomisClient } from '../../providers/nomis-client.js';
import { loadRegistry } from '../../registry/station-registry.js';
import type { PipelineContext } from '../../services/pipeline-context.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  ERRORS: 2,
  CONFIG_ERROR: 3,
  DATA_SOURCE_ERROR: 5,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export interface GlobalOptions {
  readonly verbose?: boolean;
  readonly json?: boolean;
  readonly config?: string;
  readonly timeout?: number;
}

export interface CliContext {
  readonly config: AppConfig;
  readonly startTime: number;
}

let cliContext: CliContext | null = null;

/**
 * Option parser for counts and durations
 *
 * @throws {InvalidArgumentError} Unless the value is a positive integer
 */
export function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

/**
 * Load configuration and set the log level for the rest of the run
 *
 * @throws {ConfigError} If the config file is missing or invalid
 */
export function initializeContext(options: GlobalOptions): CliContext {
  const config = loadConfig({
    configPath: options.config,
    overrides: {
      verbose: options.verbose,
      json: options.json,
      timeoutMs: options.timeout,
    },
  });

  setLogLevel(config.verbose ? 'debug' : 'warn');
  cliContext = { config, startTime: Date.now() };
  return cliContext;
}

export function getCliContext(): CliContext {
  if (!cliContext) {
    throw new Error('CLI context not initialized. Call initializeContext first.');
  }
  return cliContext;
}

/**
 * Registry and statistics client for commands that query the service
 *
 * @throws {DataSourceError} If the registry file cannot be read
 * @throws {RegistryValidationError} If the registry is invalid
 */
export function createPipelineContext(config: AppConfig): PipelineContext {
  return {
    registry: loadRegistry(config.paths.registry),
    source: createNomisClient({ config: config.nomis }),
  };
}

/**
 * Exit code for an error that escaped a command. Unknown stations and
 * anything unexpected map to ERRORS.
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof ConfigError || error instanceof RegistryValidationError) {
    return EXIT_CODES.CONFIG_ERROR;
  }
  if (error instanceof DataSourceError) {
    return EXIT_CODES.DATA_SOURCE_ERROR;
  }
  return EXIT_CODES.ERRORS;
}
