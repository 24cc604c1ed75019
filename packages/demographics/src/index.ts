/**
 * Transit EqIA demographics
 *
 * Local Study Area profiles for transit station catchments: census
 * comparisons against borough, region and country, deprivation quintiles,
 * and borough summaries of crime, homelessness and population projections.
 */

// Core
export * from './core/types.js';
export * from './core/errors.js';
export {
  loadConfig,
  findConfigFile,
  parseConfigContent,
  BUNDLED_REGISTRY_PATH,
  DEFAULT_DATA_FILES,
  DEFAULT_NOMIS_CONFIG,
  type AppConfig,
  type LoadConfigOptions,
  type NomisConfig,
  type PathsConfig,
} from './core/config.js';
export { logger, createLogger, setLogLevel, Logger, type LogLevel } from './core/utils/logger.js';
export { roundTo } from './core/utils/round.js';

// Registry
export {
  createRegistry,
  loadRegistry,
  RegistryDataSchema,
  type RegistryData,
  type StationRegistry,
} from './registry/station-registry.js';

// Statistics service
export {
  NomisClient,
  createNomisClient,
  readValues,
  type NomisClientOptions,
  type RawStatisticalResponse,
  type StatisticsSource,
} from './providers/nomis-client.js';

// Dimensions
export * from './dimensions/index.js';

// Pipeline
export type { PipelineContext } from './services/pipeline-context.js';
export { extractPercentages, percentagesOrNull, toNumber } from './services/extractor.js';
export { aggregateLsa, meanSeries } from './services/lsa-aggregator.js';
export {
  buildComparativeTable,
  buildAllDimensions,
  joinSeries,
  pivotTable,
  computeRollups,
} from './services/table-builder.js';
export { normalizeAreaName, matchWardsToAreas, type MatchStrategy, type WardMatchResult } from './services/name-matcher.js';
export {
  decileToQuintile,
  quintileDistribution,
  buildDeprivationProfile,
  QUINTILE_LABELS,
  CLASSIFIED_QUINTILES,
  type DeprivationArea,
  type DeprivationProfile,
  type QuintileDistribution,
} from './services/deprivation.js';
export {
  buildStationReport,
  fileDeprivationInputs,
  runSection,
  type DeprivationInputs,
  type ReportSources,
  type Section,
  type StationReport,
} from './services/station-report.js';

// Reference data
export { parseCsv, readCsvFile, findColumn, parseNumericCell, type CsvRecord, type CsvTable } from './ingestion/csv.js';
export { parseLsoaLookup, loadLsoaLookup } from './ingestion/lsoa-lookup.js';
export { parseImdTable, loadImdTable } from './ingestion/imd.js';

// Borough summaries
export { summariseSeries, type NamedSeries, type SeriesPoint, type SeriesSummary } from './services/series.js';
export * as population from './services/population.js';
export * as crime from './services/crime.js';
export * as homelessness from './services/homelessness.js';
