/**
 * Population projections per borough
 *
 * Input columns: AREA_CODE, AREA_NAME, AGE_GROUP and one column per
 * projection year. AGE_GROUP is a single year of age, "90 and over", or
 * "All ages".
 */

import { DataSourceError } from '../core/errors.js';
import { parseNumericCell, type CsvRecord, type CsvTable } from '../ingestion/csv.js';
import type { NamedSeries, SeriesPoint } from './series.js';

export type AgeCategory = '0-15' | '16-64' | '65+';

export const AGE_CATEGORIES: readonly AgeCategory[] = ['0-15', '16-64', '65+'];

const ALL_AGES = 'all ages';

export function yearColumns(table: CsvTable): string[] {
  return table.headers.filter((header) => /^\d+$/.test(header));
}

function requireYearColumns(table: CsvTable): string[] {
  const years = yearColumns(table);
  if (years.length === 0) {
    throw new DataSourceError('No year columns found in population projections data', {
      source: 'population',
      column: 'YYYY',
    });
  }
  return years;
}

function isAllAges(row: CsvRecord): boolean {
  return (row.AGE_GROUP ?? '').trim().toLowerCase() === ALL_AGES;
}

function seriesFor(row: CsvRecord, years: readonly string[]): SeriesPoint[] {
  const points: SeriesPoint[] = [];
  for (const year of years) {
    const value = parseNumericCell(row[year]);
    if (value !== null) {
      points.push({ period: year, value });
    }
  }
  return points;
}

function allAgesRow(table: CsvTable, borough: string): CsvRecord | undefined {
  return table.rows.find((row) => row.AREA_NAME === borough && isAllAges(row));
}

/**
 * Single year of age; "90 and over" (or any label mentioning 90) is 90
 */
export function parseAgeLabel(label: string): number | null {
  const trimmed = label.trim();
  if (/^\d+$/.test(trimmed)) {
    return parseInt(trimmed, 10);
  }
  return trimmed.includes('90') ? 90 : null;
}

export function ageCategory(age: number): AgeCategory {
  if (age <= 15) return '0-15';
  if (age <= 64) return '16-64';
  return '65+';
}

/**
 * "All ages" projection for each borough present in the data, in the
 * order the boroughs are given
 *
 * @throws {DataSourceError} If the table has no year columns
 */
export function overallGrowth(table: CsvTable, boroughs: readonly string[]): NamedSeries[] {
  const years = requireYearColumns(table);
  const series: NamedSeries[] = [];
  for (const borough of boroughs) {
    const row = allAgesRow(table, borough);
    if (row !== undefined) {
      series.push({ name: borough, points: seriesFor(row, years) });
    }
  }
  return series;
}

/**
 * Population per broad age category per year for one borough. Categories
 * with no single-age rows are omitted.
 *
 * @throws {DataSourceError} If the table has no year columns
 */
export function ageCategorySeries(table: CsvTable, borough: string): NamedSeries[] {
  const years = requireYearColumns(table);
  const totals = new Map<AgeCategory, Map<string, number>>();

  for (const row of table.rows) {
    if (row.AREA_NAME !== borough || isAllAges(row)) {
      continue;
    }
    const age = parseAgeLabel(row.AGE_GROUP ?? '');
    if (age === null) {
      continue;
    }
    const category = ageCategory(age);
    const byYear = totals.get(category) ?? new Map<string, number>();
    for (const year of years) {
      byYear.set(year, (byYear.get(year) ?? 0) + (parseNumericCell(row[year]) ?? 0));
    }
    totals.set(category, byYear);
  }

  const series: NamedSeries[] = [];
  for (const category of AGE_CATEGORIES) {
    const byYear = totals.get(category);
    if (byYear !== undefined) {
      series.push({
        name: category,
        points: years.map((year) => ({ period: year, value: byYear.get(year) ?? 0 })),
      });
    }
  }
  return series;
}

/**
 * Mean year-on-year fractional change of the "All ages" projection
 */
export function averageYearlyGrowth(table: CsvTable, borough: string): number | null {
  const row = allAgesRow(table, borough);
  if (row === undefined) {
    return null;
  }
  const points = seriesFor(row, yearColumns(table));
  const changes: number[] = [];
  for (let i = 1; i < points.length; i++) {
    const previous = points[i - 1].value;
    if (previous !== 0) {
      changes.push((points[i].value - previous) / previous);
    }
  }
  if (changes.length === 0) {
    return null;
  }
  return changes.reduce((acc, c) => acc + c, 0) / changes.length;
}

/**
 * "All ages" projection for the final projection year
 */
export function latestProjectedTotal(table: CsvTable, borough: string): number | null {
  const row = allAgesRow(table, borough);
  const years = yearColumns(table);
  const lastYear = years[years.length - 1];
  if (row === undefined || lastYear === undefined) {
    return null;
  }
  return parseNumericCell(row[lastYear]);
}

/**
 * Boroughs from the target list that appear in the data, sorted
 */
export function availableBoroughs(table: CsvTable, targets: readonly string[]): string[] {
  const present = new Set(table.rows.map((row) => row.AREA_NAME));
  return targets.filter((t) => present.has(t)).sort();
}
