/**
 * Crime Command
 *
 * Recorded offences for one borough of the study area.
 *
 * Usage:
 *   eqia crime <borough> [--file <path>] [--format <fmt>]
 */

import { resolve } from 'node:path';
import type { Command } from 'commander';
import { readCsvFile } from '../../ingestion/csv.js';
import { loadRegistry } from '../../registry/station-registry.js';
import {
  availableBoroughs,
  formatMonth,
  summariseBoroughCrime,
  type BoroughCrimeSummary,
} from '../../services/crime.js';
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

interface CrimeOptions {
  readonly file?: string;
  readonly format?: string;
}

export function registerCrimeCommand(parent: Command): void {
  parent
    .command('crime <borough>')
    .description('Recorded offences for a borough')
    .option('--file <path>', 'Borough crime CSV')
    .option('-f, --format <fmt>', 'Output format: table|json|csv', 'table')
    .action((borough: string, options: CrimeOptions) => {
      executeCrime(borough, options);
    });
}

function executeCrime(borough: string, options: CrimeOptions): void {
  const { config } = getCliContext();
  const registry = loadRegistry(config.paths.registry);
  const table = readCsvFile(options.file ? resolve(options.file) : config.paths.crime, 'crime');

  const summary = summariseBoroughCrime(table, borough);
  if (summary === null) {
    const known = availableBoroughs(table, registry.localAuthorities);
    throw new Error(`No crime data for ${borough}. Available boroughs: ${known.join(', ') || 'none'}`);
  }
  printOutput(renderCrime(summary, resolveFormat(options.format, config.json)));
}

const OFFENCE_COLUMNS: readonly TableColumn[] = [
  { key: 'name', header: 'Offence Type' },
  { key: 'count', header: 'Count', align: 'right', formatter: formatters.count },
  { key: 'share', header: 'Share', align: 'right', formatter: formatters.percent },
];

const MONTH_COLUMNS: readonly TableColumn[] = [
  { key: 'month', header: 'Month' },
  { key: 'offences', header: 'Offences', align: 'right', formatter: formatters.count },
];

export function renderCrime(summary: BoroughCrimeSummary, format: OutputFormat): string {
  if (format === 'json') {
    return formatJson(summary);
  }

  const offences: Row[] = summary.topOffences.map((o) => ({ name: o.name, count: o.count, share: o.share }));
  if (format === 'csv') {
    return formatCsv(offences, OFFENCE_COLUMNS);
  }

  const monthly: Row[] = summary.monthly.map((p) => ({ month: formatMonth(p.period), offences: p.value }));
  const lines = [
    `${summary.borough}: ${formatters.count(summary.totalOffences)} offences to ${formatMonth(summary.latestMonth)}`,
    `Top offence type: ${summary.topOffence.name} (${formatters.percent(summary.topOffence.share)})`,
    `Data last refreshed: ${summary.refreshDate ?? 'Unknown'}`,
    `Average monthly offences: ${formatters.count(Math.trunc(summary.averageMonthly))}`,
    `Peak month: ${formatMonth(summary.peakMonth.month)} (${summary.peakMonth.count} offences)`,
    `Lowest month: ${formatMonth(summary.lowestMonth.month)} (${summary.lowestMonth.count} offences)`,
  ];
  return [lines.join('\n'), formatTable(offences, OFFENCE_COLUMNS), formatTable(monthly, MONTH_COLUMNS)].join(
    '\n\n'
  );
}
