/**
 * Homelessness Command
 *
 * Quarterly rough sleeping counts for the study area boroughs and the
 * region.
 *
 * Usage:
 *   eqia homelessness [--file <path>] [--format <fmt>]
 */

import { resolve } from 'node:path';
import type { Command } from 'commander';
import { readCsvFile } from '../../ingestion/csv.js';
import { loadRegistry } from '../../registry/station-registry.js';
import { summariseHomelessness, type HomelessnessSummary } from '../../services/homelessness.js';
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

interface HomelessnessOptions {
  readonly file?: string;
  readonly format?: string;
}

export function registerHomelessnessCommand(parent: Command): void {
  parent
    .command('homelessness')
    .description('Rough sleeping counts for the study area boroughs')
    .option('--file <path>', 'Quarterly homelessness CSV')
    .option('-f, --format <fmt>', 'Output format: table|json|csv', 'table')
    .action((options: HomelessnessOptions) => {
      const { config } = getCliContext();
      const registry = loadRegistry(config.paths.registry);
      const table = readCsvFile(
        options.file ? resolve(options.file) : config.paths.homelessness,
        'homelessness'
      );
      const summary = summariseHomelessness(table, registry.localAuthorities, registry.regionAuthority);
      printOutput(renderHomelessness(summary, resolveFormat(options.format, config.json)));
    });
}

const SUMMARY_COLUMNS: readonly TableColumn[] = [
  { key: 'area', header: 'Area' },
  { key: 'quarters', header: 'Quarters', align: 'right' },
  { key: 'average', header: 'Average', align: 'right', formatter: formatters.decimal },
  { key: 'minimum', header: 'Minimum', align: 'right', formatter: formatters.decimal },
  { key: 'maximum', header: 'Maximum', align: 'right', formatter: formatters.decimal },
];

/**
 * Summary row per borough, then the region
 */
export function homelessnessRows(summary: HomelessnessSummary): Row[] {
  const areas = summary.region === null ? summary.boroughs : [...summary.boroughs, summary.region];
  return areas.map((area) => ({
    area: area.name,
    quarters: area.points.length,
    average: area.summary?.average ?? null,
    minimum: area.summary?.minimum ?? null,
    maximum: area.summary?.maximum ?? null,
  }));
}

export function renderHomelessness(summary: HomelessnessSummary, format: OutputFormat): string {
  switch (format) {
    case 'json':
      return formatJson(summary);
    case 'csv':
      return formatCsv(homelessnessRows(summary), SUMMARY_COLUMNS);
    case 'table':
      if (summary.boroughs.length === 0 && summary.region === null) {
        return 'No homelessness data for the study area boroughs.';
      }
      return formatTable(homelessnessRows(summary), SUMMARY_COLUMNS);
  }
}
