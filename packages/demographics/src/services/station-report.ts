/**
 * Station Report
 *
 * Everything known about one station's Local Study Area: the four census
 * dimensions, broad age bands and the deprivation profile. Sections fail
 * independently: a broken reference file marks its own section as failed
 * and the rest of the report is still produced.
 */

import { isDataSourceError, type DataSourceName } from '../core/errors.js';
import type { DeprivationRecord, DimensionResult, JoinRecord, PivotTable, Ward } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import { AGE_DIMENSION, DIMENSIONS, type DimensionDefinition } from '../dimensions/index.js';
import { loadImdTable } from '../ingestion/imd.js';
import { loadLsoaLookup } from '../ingestion/lsoa-lookup.js';
import { buildDeprivationProfile, type DeprivationProfile } from './deprivation.js';
import type { PipelineContext } from './pipeline-context.js';
import { buildAllDimensions, computeRollups } from './table-builder.js';

const logger = createLogger({ module: 'station-report' });

export type Section<T> =
  | { readonly status: 'ok'; readonly value: T }
  | {
      readonly status: 'failed';
      readonly error: { readonly source: DataSourceName; readonly message: string };
    }
  | { readonly status: 'skipped' };

export interface DeprivationInputs {
  readonly lookup: readonly JoinRecord[];
  readonly imd: ReadonlyMap<string, DeprivationRecord>;
}

export interface ReportSources {
  /** Omit to leave the deprivation section out */
  readonly deprivation?: () => DeprivationInputs;
  readonly dimensions?: readonly DimensionDefinition[];
}

export interface StationReport {
  readonly station: string;
  readonly wards: readonly Ward[];
  readonly dimensions: readonly DimensionResult[];
  /** 0-15 / 16-64 / 65+ shares; `null` when age is unavailable */
  readonly ageBands: PivotTable | null;
  readonly deprivation: Section<DeprivationProfile>;
}

/**
 * Deprivation inputs read from the lookup and IMD files on each call
 */
export function fileDeprivationInputs(paths: {
  readonly lsoaLookup: string;
  readonly imd: string;
}): () => DeprivationInputs {
  return () => ({
    lookup: loadLsoaLookup(paths.lsoaLookup),
    imd: loadImdTable(paths.imd),
  });
}

/**
 * Run a section; a DataSourceError becomes a failed section, anything
 * else propagates
 */
export function runSection<T>(station: string, produce: () => T): Section<T> {
  try {
    return { status: 'ok', value: produce() };
  } catch (error) {
    if (!isDataSourceError(error)) {
      throw error;
    }
    logger.error('Report section failed', { station, error: error.toLogString() });
    return { status: 'failed', error: { source: error.source, message: error.message } };
  }
}

/**
 * @throws {StationNotFoundError} If the station is not in the registry
 */
export async function buildStationReport(
  context: PipelineContext,
  stationName: string,
  sources: ReportSources = {}
): Promise<StationReport> {
  const station = context.registry.getStation(stationName);
  const dimensions = await buildAllDimensions(context, stationName, sources.dimensions ?? DIMENSIONS);

  const age = dimensions.find((d) => d.dimension === AGE_DIMENSION.key);
  const ageBands =
    age !== undefined && age.status === 'available' && AGE_DIMENSION.rollups !== undefined
      ? computeRollups(age.table, AGE_DIMENSION.rollups)
      : null;

  const loadDeprivation = sources.deprivation;
  const deprivation: Section<DeprivationProfile> =
    loadDeprivation === undefined
      ? { status: 'skipped' }
      : runSection(stationName, () => {
          const { lookup, imd } = loadDeprivation();
          return buildDeprivationProfile(context.registry, stationName, lookup, imd);
        });

  return {
    station: station.name,
    wards: station.wards,
    dimensions,
    ageBands,
    deprivation,
  };
}
