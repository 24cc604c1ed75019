/**
 * Rough sleeping counts per borough and for the region
 *
 * Input: an `Area` column and one column per quarter (headers containing
 * "Q", e.g. "2023-24 Q1"). The published file carries footnote rows under
 * the data; those are dropped.
 */

import { DataSourceError } from '../core/errors.js';
import { parseNumericCell, type CsvRecord, type CsvTable } from '../ingestion/csv.js';
import { summariseSeries, type NamedSeries, type SeriesPoint, type SeriesSummary } from './series.js';

const AREA_COLUMN = 'Area';
const METADATA_ROW = /Source|Email|Downloaded|Explanatory|Date|Note/i;

export interface AreaHomelessness extends NamedSeries {
  /** `null` when the area has no numeric quarters */
  readonly summary: SeriesSummary | null;
}

export interface HomelessnessSummary {
  readonly quarters: readonly string[];
  /** Requested boroughs present in the data, in the order given */
  readonly boroughs: readonly AreaHomelessness[];
  /** `null` when the region row is absent */
  readonly region: AreaHomelessness | null;
}

export function quarterColumns(table: CsvTable): string[] {
  return table.headers.filter((header) => header !== AREA_COLUMN && header.includes('Q'));
}

/**
 * Rows naming a real area; blank and footnote rows removed
 *
 * @throws {DataSourceError} If the table has no Area column
 */
export function dataRows(table: CsvTable): CsvRecord[] {
  if (!table.headers.includes(AREA_COLUMN)) {
    throw new DataSourceError('Homelessness data is missing the "Area" column', {
      source: 'homelessness',
      column: AREA_COLUMN,
    });
  }
  return table.rows.filter((row) => {
    const area = (row[AREA_COLUMN] ?? '').trim();
    return area !== '' && !METADATA_ROW.test(area);
  });
}

function areaSeries(row: CsvRecord, quarters: readonly string[]): AreaHomelessness {
  const points: SeriesPoint[] = [];
  for (const quarter of quarters) {
    const value = parseNumericCell(row[quarter]);
    if (value !== null) {
      points.push({ period: quarter, value });
    }
  }
  return { name: row[AREA_COLUMN].trim(), points, summary: summariseSeries(points) };
}

/**
 * @throws {DataSourceError} If the table has no Area column
 */
export function summariseHomelessness(
  table: CsvTable,
  boroughs: readonly string[],
  regionName: string | undefined
): HomelessnessSummary {
  const rows = dataRows(table);
  const quarters = quarterColumns(table);
  const byArea = new Map<string, CsvRecord>();
  for (const row of rows) {
    const area = row[AREA_COLUMN].trim();
    if (!byArea.has(area)) {
      byArea.set(area, row);
    }
  }

  const boroughSeries: AreaHomelessness[] = [];
  for (const borough of boroughs) {
    const row = byArea.get(borough);
    if (row !== undefined) {
      boroughSeries.push(areaSeries(row, quarters));
    }
  }

  const regionRow = regionName === undefined ? undefined : byArea.get(regionName);

  return {
    quarters,
    boroughs: boroughSeries,
    region: regionRow === undefined ? null : areaSeries(regionRow, quarters),
  };
}
