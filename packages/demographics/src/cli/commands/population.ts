/**
 * Population Command
 *
 * Projected population for one borough: yearly totals and broad age
 * categories.
 *
 * Usage:
 *   eqia population <borough> [--file <path>] [--format <fmt>]
 */

import { resolve } from 'node:path';
import type { Command } from 'commander';
import { readCsvFile, type CsvTable } from '../../ingestion/csv.js';
import {
  ageCategorySeries,
  averageYearlyGrowth,
  latestProjectedTotal,
  overallGrowth,
} from '../../services/population.js';
import type { NamedSeries } from '../../services/series.js';
import { getCliContext } from '../lib/context.js';
import {
  formatCsv,
  formatJson,
  formatTable,
  formatters,
  printOutput,
  resolveFormat,
  type OutputFormat,
  type Row,
  type TableColumn,
} from '../lib/output.js';

interface PopulationOptions {
  readonly file?: string;
  readonly format?: string;
}

export interface PopulationSummary {
  readonly borough: string;
  readonly total: NamedSeries | null;
  readonly ageCategories: readonly NamedSeries[];
  /** Mean year-on-year fractional change */
  readonly averageGrowth: number | null;
  readonly latestTotal: number | null;
}

export function registerPopulationCommand(parent: Command): void {
  parent
    .command('population <borough>')
    .description('Projected population for a borough')
    .option('--file <path>', 'Population projections CSV')
    .option('-f, --format <fmt>', 'Output format: table|json|csv', 'table')
    .action((borough: string, options: PopulationOptions) => {
      const { config } = getCliContext();
      const table = readCsvFile(
        options.file ? resolve(options.file) : config.paths.population,
        'population'
      );
      printOutput(
        renderPopulation(summarisePopulation(table, borough), resolveFormat(options.format, config.json))
      );
    });
}

/**
 * @throws {DataSourceError} If the table has no year columns
 */
export function summarisePopulation(table: CsvTable, borough: string): PopulationSummary {
  const [total] = overallGrowth(table, [borough]);
  return {
    borough,
    total: total ?? null,
    ageCategories: ageCategorySeries(table, borough),
    averageGrowth: averageYearlyGrowth(table, borough),
    latestTotal: latestProjectedTotal(table, borough),
  };
}

function yearRows(summary: PopulationSummary): Row[] {
  const rows = new Map<string, Record<string, number>>();
  const add = (series: NamedSeries, column: string): void => {
    for (const point of series.points) {
      const row = rows.get(point.period) ?? {};
      row[column] = point.value;
      rows.set(point.period, row);
    }
  };
  if (summary.total !== null) add(summary.total, 'All ages');
  for (const category of summary.ageCategories) add(category, category.name);
  return [...rows.entries()].map(([year, values]) => ({ year, ...values }));
}

function yearColumns(summary: PopulationSummary): TableColumn[] {
  const names = [
    ...(summary.total === null ? [] : ['All ages']),
    ...summary.ageCategories.map((c) => c.name),
  ];
  return [
    { key: 'year', header: 'Year' },
    ...names.map(
      (name): TableColumn => ({ key: name, header: name, align: 'right', formatter: formatters.count })
    ),
  ];
}

export function renderPopulation(summary: PopulationSummary, format: OutputFormat): string {
  switch (format) {
    case 'json':
      return formatJson(summary);
    case 'csv':
      return formatCsv(yearRows(summary), yearColumns(summary));
    case 'table': {
      if (summary.total === null && summary.ageCategories.length === 0) {
        return `No population projections for ${summary.borough}.`;
      }
      const growth =
        summary.averageGrowth === null ? '-' : `${(summary.averageGrowth * 100).toFixed(2)}%`;
      const header = [
        `${summary.borough}: projected ${formatters.count(summary.latestTotal)} in the final year`,
        `Average yearly growth: ${growth}`,
      ].join('\n');
      return `${header}\n\n${formatTable(yearRows(summary), yearColumns(summary))}`;
    }
  }
}
