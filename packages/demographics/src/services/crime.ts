/**
 * Recorded crime per borough
 *
 * Input columns: Borough_SNT, Month_Year (dd/mm/yyyy), Offence Group,
 * Offence Subgroup, Count and optionally Refresh Date. One row per
 * (borough, month, subgroup).
 */

import { DataSourceError } from '../core/errors.js';
import { roundTo } from '../core/utils/round.js';
import { createLogger } from '../core/utils/logger.js';
import { parseNumericCell, type CsvTable } from '../ingestion/csv.js';
import type { SeriesPoint } from './series.js';

const logger = createLogger({ module: 'crime' });

export const CRIME_COLUMNS = {
  borough: 'Borough_SNT',
  month: 'Month_Year',
  group: 'Offence Group',
  subgroup: 'Offence Subgroup',
  count: 'Count',
  refreshDate: 'Refresh Date',
} as const;

const REQUIRED_COLUMNS = [
  CRIME_COLUMNS.borough,
  CRIME_COLUMNS.month,
  CRIME_COLUMNS.group,
  CRIME_COLUMNS.count,
] as const;

const TOP_OFFENCE_LIMIT = 10;

const MONTH_NAMES = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
] as const;

export interface OffenceShare {
  readonly name: string;
  readonly count: number;
  /** Percent of the enclosing total, one decimal */
  readonly share: number;
}

export interface OffenceGroupBreakdown extends OffenceShare {
  /** Shares of this group's count, largest first */
  readonly subgroups: readonly OffenceShare[];
}

export interface MonthCount {
  /** YYYY-MM */
  readonly month: string;
  readonly count: number;
}

export interface BoroughCrimeSummary {
  readonly borough: string;
  readonly totalOffences: number;
  readonly topOffence: OffenceShare;
  /** YYYY-MM */
  readonly latestMonth: string;
  readonly refreshDate: string | null;
  /** Offence groups by count, largest first */
  readonly offenceGroups: readonly OffenceShare[];
  readonly topOffences: readonly OffenceShare[];
  /** Offence groups by name, each with its subgroups largest first */
  readonly breakdown: readonly OffenceGroupBreakdown[];
  /** Monthly totals, oldest first */
  readonly monthly: readonly SeriesPoint[];
  readonly averageMonthly: number;
  readonly peakMonth: MonthCount;
  readonly lowestMonth: MonthCount;
}

/**
 * dd/mm/yyyy → YYYY-MM, or `null` when the date is not valid
 */
export function parseMonth(value: string | undefined): string | null {
  const match = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/.exec((value ?? '').trim());
  if (match === null) {
    return null;
  }
  const day = parseInt(match[1], 10);
  const month = parseInt(match[2], 10);
  if (month < 1 || month > 12 || day < 1 || day > 31) {
    return null;
  }
  return `${match[3]}-${String(month).padStart(2, '0')}`;
}

/**
 * @example formatMonth('2024-03') === 'March 2024'
 */
export function formatMonth(month: string): string {
  const [year, mm] = month.split('-');
  const name = MONTH_NAMES[parseInt(mm ?? '', 10) - 1];
  return name === undefined ? month : `${name} ${year}`;
}

function requireColumns(table: CsvTable): void {
  for (const column of REQUIRED_COLUMNS) {
    if (!table.headers.includes(column)) {
      throw new DataSourceError(`Crime data is missing the "${column}" column`, {
        source: 'crime',
        column,
      });
    }
  }
}

function addTo(totals: Map<string, number>, key: string, count: number): void {
  totals.set(key, (totals.get(key) ?? 0) + count);
}

function shares(totals: Map<string, number>, total: number): OffenceShare[] {
  return [...totals.entries()]
    .map(([name, count]) => ({
      name,
      count,
      share: total === 0 ? 0 : roundTo((count / total) * 100, 1),
    }))
    .sort((a, b) => b.count - a.count);
}

/**
 * Boroughs from the target list that appear in the data, sorted
 *
 * @throws {DataSourceError} If a required column is missing
 */
export function availableBoroughs(table: CsvTable, targets: readonly string[]): string[] {
  requireColumns(table);
  const present = new Set(table.rows.map((row) => row[CRIME_COLUMNS.borough]));
  return targets.filter((t) => present.has(t)).sort();
}

/**
 * Offence totals, trends and breakdowns for one borough. Rows with an
 * unparseable month or count are skipped.
 *
 * @returns `null` when the borough has no usable rows
 * @throws {DataSourceError} If a required column is missing
 */
export function summariseBoroughCrime(
  table: CsvTable,
  borough: string
): BoroughCrimeSummary | null {
  requireColumns(table);

  const groupTotals = new Map<string, number>();
  const subgroupTotals = new Map<string, Map<string, number>>();
  const monthTotals = new Map<string, number>();
  let refreshDate: string | null = null;
  let skipped = 0;

  for (const row of table.rows) {
    if (row[CRIME_COLUMNS.borough] !== borough) {
      continue;
    }
    const month = parseMonth(row[CRIME_COLUMNS.month]);
    const count = parseNumericCell(row[CRIME_COLUMNS.count]);
    if (month === null || count === null) {
      skipped += 1;
      continue;
    }

    const group = row[CRIME_COLUMNS.group] ?? '';
    addTo(groupTotals, group, count);
    addTo(monthTotals, month, count);

    const subgroups = subgroupTotals.get(group) ?? new Map<string, number>();
    addTo(subgroups, row[CRIME_COLUMNS.subgroup] ?? '', count);
    subgroupTotals.set(group, subgroups);

    if (refreshDate === null) {
      const refresh = (row[CRIME_COLUMNS.refreshDate] ?? '').trim();
      refreshDate = refresh === '' ? null : refresh;
    }
  }

  if (skipped > 0) {
    logger.warn('Skipped crime rows with invalid month or count', { borough, skipped });
  }

  if (groupTotals.size === 0) {
    return null;
  }

  let totalOffences = 0;
  for (const count of groupTotals.values()) {
    totalOffences += count;
  }
  const ranked = shares(groupTotals, totalOffences);

  const monthly: SeriesPoint[] = [...monthTotals.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([period, value]) => ({ period, value }));

  let peak = monthly[0];
  let lowest = monthly[0];
  for (const point of monthly) {
    if (point.value > peak.value) peak = point;
    if (point.value < lowest.value) lowest = point;
  }

  const breakdown: OffenceGroupBreakdown[] = ranked
    .map((group) => ({
      ...group,
      subgroups: shares(subgroupTotals.get(group.name) ?? new Map<string, number>(), group.count),
    }))
    .sort((a, b) => a.name.localeCompare(b.name));

  return {
    borough,
    totalOffences,
    topOffence: ranked[0],
    latestMonth: monthly[monthly.length - 1].period,
    refreshDate,
    offenceGroups: ranked,
    topOffences: ranked.slice(0, TOP_OFFENCE_LIMIT),
    breakdown,
    monthly,
    averageMonthly: totalOffences / monthly.length,
    peakMonth: { month: peak.period, count: peak.value },
    lowestMonth: { month: lowest.period, count: lowest.value },
  };
}
