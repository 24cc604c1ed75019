/**
 * Profile Command
 *
 * Census comparison tables for a station's Local Study Area against the
 * borough, London and England.
 *
 * Usage:
 *   eqia profile <station> [options]
 *
 * Options:
 *   -d, --dimension <key>  One of age, gender, ethnicity, religion (default: all)
 *   -f, --format <fmt>     table|json|csv (default: table)
 */

import type { Command } from 'commander';
import type { DimensionResult, PivotTable } from '../../core/types.js';
import { DIMENSIONS, findDimension, type DimensionDefinition } from '../../dimensions/index.js';
import { buildStationReport, type StationReport } from '../../services/station-report.js';
import { pivotTable } from '../../services/table-builder.js';
import { createPipelineContext, getCliContext } from '../lib/context.js';
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

interface ProfileOptions {
  readonly dimension?: string;
  readonly format?: string;
}

export function registerProfileCommand(parent: Command): void {
  parent
    .command('profile <station>')
    .description('Compare the Local Study Area with borough, London and England')
    .option('-d, --dimension <key>', 'Single dimension: age|gender|ethnicity|religion')
    .option('-f, --format <fmt>', 'Output format: table|json|csv', 'table')
    .action(async (station: string, options: ProfileOptions) => {
      await executeProfile(station, options);
    });
}

/**
 * @throws {Error} If the dimension key is not known
 */
export function selectDimensions(key: string | undefined): readonly DimensionDefinition[] {
  if (key === undefined) {
    return DIMENSIONS;
  }
  const dimension = findDimension(key);
  if (dimension === undefined) {
    throw new Error(
      `Unknown dimension: ${key}. Must be one of: ${DIMENSIONS.map((d) => d.key).join(', ')}`
    );
  }
  return [dimension];
}

async function executeProfile(station: string, options: ProfileOptions): Promise<void> {
  const { config } = getCliContext();
  const dimensions = selectDimensions(options.dimension);
  const format = resolveFormat(options.format, config.json);

  const report = await buildStationReport(createPipelineContext(config), station, { dimensions });
  printOutput(renderProfile(report, dimensions, format));
}

function pivotRows(pivot: PivotTable): Row[] {
  return pivot.rows.map((row) => ({ category: row.category, ...row.values }));
}

function pivotColumns(categoryLabel: string, areas: readonly string[]): TableColumn[] {
  return [
    { key: 'category', header: categoryLabel },
    ...areas.map(
      (area): TableColumn => ({
        key: area,
        header: area,
        align: 'right',
        formatter: formatters.percent,
      })
    ),
  ];
}

function renderDimensionTable(result: DimensionResult, definition: DimensionDefinition): string {
  if (result.status === 'unavailable') {
    return `${definition.label}\n${result.reason}`;
  }
  const pivot = pivotTable(result.table);
  return `${definition.label}\n${formatTable(pivotRows(pivot), pivotColumns(definition.categoryLabel, pivot.areas))}`;
}

/**
 * Long-form rows of every available dimension
 */
export function profileCsvRows(report: StationReport): Row[] {
  const rows: Row[] = [];
  for (const result of report.dimensions) {
    if (result.status !== 'available') continue;
    for (const row of result.table.rows) {
      rows.push({
        station: report.station,
        dimension: result.dimension,
        area: row.area,
        category: row.category,
        percentage: row.percentage,
      });
    }
  }
  return rows;
}

const CSV_COLUMNS: readonly TableColumn[] = [
  { key: 'station', header: 'Station' },
  { key: 'dimension', header: 'Dimension' },
  { key: 'area', header: 'Area' },
  { key: 'category', header: 'Category' },
  {
    key: 'percentage',
    header: 'Percentage',
    formatter: (value) => (typeof value === 'number' ? String(value) : ''),
  },
];

export function renderProfile(
  report: StationReport,
  dimensions: readonly DimensionDefinition[],
  format: OutputFormat
): string {
  switch (format) {
    case 'json':
      return formatJson({
        station: report.station,
        wards: report.wards,
        dimensions: report.dimensions,
        ageBands: report.ageBands,
      });
    case 'csv':
      return formatCsv(profileCsvRows(report), CSV_COLUMNS);
    case 'table': {
      const sections = [`Local Study Area: ${report.station} (${report.wards.length} wards)`];
      for (const definition of dimensions) {
        const result = report.dimensions.find((d) => d.dimension === definition.key);
        if (result !== undefined) {
          sections.push(renderDimensionTable(result, definition));
        }
      }
      if (report.ageBands !== null) {
        sections.push(
          `Broad Age Bands\n${formatTable(pivotRows(report.ageBands), pivotColumns('Age Band', report.ageBands.areas))}`
        );
      }
      return sections.join('\n\n');
    }
  }
}
