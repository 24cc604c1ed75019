/**
 * Local Study Area Aggregator
 *
 * Reduces the raw value arrays of a station's wards to one series by
 * unweighted, index-wise arithmetic mean. Works on raw arrays, so the
 * result keeps whatever layout the service returned and still has to go
 * through the extractor.
 *
 * Wards whose fetch failed, returned no `value` array, or contained a
 * non-numeric element are skipped. Ward entries sharing an area code each
 * contribute once per entry.
 *
 * Arrays of different lengths are truncated to the shortest one, and a
 * warning names the lengths involved.
 */

import type { DimensionFilter } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import { readValues } from '../providers/nomis-client.js';
import { toNumber } from './extractor.js';
import type { PipelineContext } from './pipeline-context.js';

const logger = createLogger({ module: 'lsa-aggregator' });

/**
 * Index-wise mean over equal-role arrays, truncated to the shortest
 */
export function meanSeries(series: readonly (readonly number[])[]): number[] | null {
  if (series.length === 0) {
    return null;
  }

  const length = Math.min(...series.map((values) => values.length));
  const means: number[] = [];
  for (let i = 0; i < length; i++) {
    let sum = 0;
    for (const values of series) {
      sum += values[i];
    }
    means.push(sum / series.length);
  }
  return means;
}

function toNumericArray(values: readonly unknown[]): number[] | null {
  const numbers: number[] = [];
  for (const raw of values) {
    const value = toNumber(raw);
    if (value === undefined) {
      return null;
    }
    numbers.push(value);
  }
  return numbers;
}

/**
 * Mean raw series across the station's wards
 *
 * @returns `null` when no ward produced data
 * @throws {StationNotFoundError} If the station is not in the registry
 */
export async function aggregateLsa(
  context: PipelineContext,
  stationName: string,
  datasetId: string,
  filter: DimensionFilter | null
): Promise<number[] | null> {
  const station = context.registry.getStation(stationName);
  const wardSeries: number[][] = [];

  for (const ward of station.wards) {
    const response = await context.source.fetch(datasetId, ward.areaCode, filter);
    const values = readValues(response);

    if (values === null) {
      logger.debug('Skipping ward without data', {
        station: stationName,
        ward: ward.name,
        areaCode: ward.areaCode,
        datasetId,
      });
      continue;
    }

    const numeric = toNumericArray(values);
    if (numeric === null) {
      logger.warn('Skipping ward with non-numeric values', {
        station: stationName,
        ward: ward.name,
        areaCode: ward.areaCode,
        datasetId,
      });
      continue;
    }

    wardSeries.push(numeric);
  }

  if (wardSeries.length === 0) {
    logger.warn('No ward data for local study area', { station: stationName, datasetId });
    return null;
  }

  const lengths = new Set(wardSeries.map((values) => values.length));
  if (lengths.size > 1) {
    logger.warn('Ward value arrays differ in length; truncating to shortest', {
      station: stationName,
      datasetId,
      lengths: [...lengths],
    });
  }

  return meanSeries(wardSeries);
}
