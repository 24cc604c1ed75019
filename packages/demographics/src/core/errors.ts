/**
 * Error Types
 *
 * Exceptions are reserved for configuration faults and reference-file
 * failures. "No data" outcomes from the statistics service are values
 * (`null`, `{ kind: 'unavailable' }`), never errors.
 */

/**
 * Reference data sources that can fail independently of each other
 */
export type DataSourceName =
  | 'registry'
  | 'lsoa-lookup'
  | 'imd'
  | 'homelessness'
  | 'crime'
  | 'population';

/**
 * Thrown when a station name is not present in the registry
 */
export class StationNotFoundError extends Error {
  public readonly name = 'StationNotFoundError' as const;

  constructor(
    public readonly station: string,
    public readonly knownStations: readonly string[]
  ) {
    super(`Unknown station "${station}". Known stations: ${knownStations.join(', ')}`);
    Object.setPrototypeOf(this, StationNotFoundError.prototype);
  }
}

/**
 * Thrown when registry data does not satisfy its schema or invariants
 */
export class RegistryValidationError extends Error {
  public readonly name = 'RegistryValidationError' as const;

  constructor(
    message: string,
    public readonly issues: readonly string[]
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    Object.setPrototypeOf(this, RegistryValidationError.prototype);
  }
}

/**
 * Details about a failed reference data source
 */
export interface DataSourceErrorDetails {
  readonly source: DataSourceName;
  /** File the data was read from, when file-backed */
  readonly path?: string;
  /** Logical column that could not be located */
  readonly column?: string;
  readonly cause?: unknown;
}

/**
 * Thrown when a CSV reference file is missing, unreadable, or lacks a
 * required column. Scoped to one source: report assembly turns it into a
 * failed section and carries on with the others.
 *
 * @example
 * ```typescript
 * throw new DataSourceError('IMD decile column not found', {
 *   source: 'imd',
 *   path: 'IMD 2025.csv',
 *   column: 'IMD Decile',
 * });
 * ```
 */
export class DataSourceError extends Error {
  public readonly name = 'DataSourceError' as const;

  constructor(
    message: string,
    public readonly details: DataSourceErrorDetails
  ) {
    super(message);
    Object.setPrototypeOf(this, DataSourceError.prototype);
  }

  get source(): DataSourceName {
    return this.details.source;
  }

  /**
   * Create a formatted error message for logging
   */
  toLogString(): string {
    const parts = [`DataSourceError: ${this.message}`, `  Source: ${this.source}`];
    if (this.details.path) {
      parts.push(`  Path: ${this.details.path}`);
    }
    if (this.details.column) {
      parts.push(`  Column: ${this.details.column}`);
    }
    return parts.join('\n');
  }
}

/**
 * Thrown when a configuration file cannot be read or is invalid
 */
export class ConfigError extends Error {
  public readonly name = 'ConfigError' as const;

  constructor(
    message: string,
    public readonly configPath: string | null
  ) {
    super(message);
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/**
 * Type guard to check if an error is a DataSourceError
 */
export function isDataSourceError(error: unknown): error is DataSourceError {
  return error instanceof DataSourceError;
}

/**
 * Render any thrown value as a message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
