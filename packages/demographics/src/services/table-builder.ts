/**
 * Comparative Table Builder
 *
 * Joins the Local Study Area series with the three comparison-area series
 * into one long-form table per dimension: one row per (area, category) in
 * canonical area order × taxonomy order, "Total" excluded.
 *
 * A missing series leaves its rows in place with `percentage: null`. Only
 * when every series is missing does the dimension report "unavailable".
 */

import {
  LOCAL_STUDY_AREA,
  type ComparativeRow,
  type ComparativeTable,
  type DimensionResult,
  type PivotTable,
} from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import { roundTo } from '../core/utils/round.js';
import { DIMENSIONS, TOTAL_CATEGORY, type CategoryRollup, type DimensionDefinition } from '../dimensions/index.js';
import { readValues } from '../providers/nomis-client.js';
import { extractPercentages, percentagesOrNull } from './extractor.js';
import { aggregateLsa } from './lsa-aggregator.js';
import type { PipelineContext } from './pipeline-context.js';

const logger = createLogger({ module: 'table-builder' });

interface AreaSeries {
  readonly area: string;
  readonly values: readonly number[] | null;
}

/**
 * Long-form rows for the given series, in the order the series are passed
 */
export function joinSeries(
  taxonomy: readonly string[],
  series: readonly AreaSeries[]
): ComparativeRow[] {
  const rows: ComparativeRow[] = [];
  for (const { area, values } of series) {
    taxonomy.forEach((category, index) => {
      if (category === TOTAL_CATEGORY) {
        return;
      }
      rows.push({
        area,
        category,
        percentage: values !== null && index < values.length ? values[index] : null,
      });
    });
  }
  return rows;
}

/**
 * Build the comparison table of one dimension for a station
 *
 * @throws {StationNotFoundError} If the station is not in the registry
 */
export async function buildComparativeTable(
  context: PipelineContext,
  stationName: string,
  dimension: DimensionDefinition
): Promise<DimensionResult> {
  const { registry, source } = context;
  const datasetId = registry.datasetId(dimension.datasetKey);
  const categoryCount = dimension.taxonomy.length;

  const lsaRaw = await aggregateLsa(context, stationName, datasetId, dimension.filter);
  const series: AreaSeries[] = [
    {
      area: LOCAL_STUDY_AREA,
      values: percentagesOrNull(extractPercentages(lsaRaw, categoryCount)),
    },
  ];

  for (const area of registry.comparisonAreas) {
    const response = await source.fetch(datasetId, area.areaCode, dimension.filter);
    series.push({
      area: area.name,
      values: percentagesOrNull(extractPercentages(readValues(response), categoryCount)),
    });
  }

  if (series.every((s) => s.values === null)) {
    logger.warn('Dimension unavailable for station', {
      station: stationName,
      dimension: dimension.key,
      datasetId,
    });
    return {
      status: 'unavailable',
      dimension: dimension.key,
      reason: `${dimension.label} data not available for ${stationName}`,
    };
  }

  const missing = series.filter((s) => s.values === null).map((s) => s.area);
  if (missing.length > 0) {
    logger.info('Dimension has missing areas', {
      station: stationName,
      dimension: dimension.key,
      missing,
    });
  }

  const table: ComparativeTable = {
    station: stationName,
    dimension: dimension.key,
    areas: registry.canonicalAreaOrder,
    categories: dimension.taxonomy.filter((c) => c !== TOTAL_CATEGORY),
    rows: joinSeries(dimension.taxonomy, series),
  };

  return { status: 'available', dimension: dimension.key, table };
}

/**
 * Build every dimension in report order. Dimensions are independent; one
 * being unavailable does not affect the others.
 */
export async function buildAllDimensions(
  context: PipelineContext,
  stationName: string,
  dimensions: readonly DimensionDefinition[] = DIMENSIONS
): Promise<DimensionResult[]> {
  const results: DimensionResult[] = [];
  for (const dimension of dimensions) {
    results.push(await buildComparativeTable(context, stationName, dimension));
  }
  return results;
}

// ============================================================================
// Derived views
// ============================================================================

function lookupCell(table: ComparativeTable, area: string, category: string): number | null {
  const row = table.rows.find((r) => r.area === area && r.category === category);
  return row?.percentage ?? null;
}

/**
 * Category × area grid with values rounded for display
 */
export function pivotTable(table: ComparativeTable, decimals = 1): PivotTable {
  return {
    dimension: table.dimension,
    areas: table.areas,
    rows: table.categories.map((category) => {
      const values: Record<string, number | null> = {};
      for (const area of table.areas) {
        const cell = lookupCell(table, area, category);
        values[area] = cell === null ? null : roundTo(cell, decimals);
      }
      return { category, values };
    }),
  };
}

/**
 * Sum fixed category groups per area (e.g. broad age bands). A band is
 * `null` for an area when any of its categories is missing there.
 */
export function computeRollups(
  table: ComparativeTable,
  rollups: readonly CategoryRollup[]
): PivotTable {
  return {
    dimension: table.dimension,
    areas: table.areas,
    rows: rollups.map((rollup) => {
      const values: Record<string, number | null> = {};
      for (const area of table.areas) {
        let sum: number | null = 0;
        for (const category of rollup.categories) {
          const cell = lookupCell(table, area, category);
          if (cell === null || sum === null) {
            sum = null;
            break;
          }
          sum += cell;
        }
        values[area] = sum;
      }
      return { category: rollup.label, values };
    }),
  };
}
