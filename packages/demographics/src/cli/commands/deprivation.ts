/**
 * Deprivation Command
 *
 * IMD quintile distribution of the fine areas inside a station's wards.
 *
 * Usage:
 *   eqia deprivation <station> [options]
 *
 * Options:
 *   --lookup <path>     LSOA to ward lookup CSV (default from config)
 *   --imd <path>        IMD CSV (default from config)
 *   --areas             Also list every matched area with its domain deciles,
 *                       most deprived first
 *   -f, --format <fmt>  table|json|csv (default: table)
 */

import { resolve } from 'node:path';
import type { Command } from 'commander';
import type { DeprivationDomain } from '../../core/types.js';
import { loadRegistry } from '../../registry/station-registry.js';
import {
  buildDeprivationProfile,
  CLASSIFIED_QUINTILES,
  QUINTILE_LABELS,
  type DeprivationProfile,
} from '../../services/deprivation.js';
import { fileDeprivationInputs } from '../../services/station-report.js';
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

interface DeprivationOptions {
  readonly lookup?: string;
  readonly imd?: string;
  readonly areas?: boolean;
  readonly format?: string;
}

export function registerDeprivationCommand(parent: Command): void {
  parent
    .command('deprivation <station>')
    .description('IMD quintile distribution of the Local Study Area')
    .option('--lookup <path>', 'LSOA to ward lookup CSV')
    .option('--imd <path>', 'Index of Multiple Deprivation CSV')
    .option('--areas', 'List every matched area')
    .option('-f, --format <fmt>', 'Output format: table|json|csv', 'table')
    .action((station: string, options: DeprivationOptions) => {
      executeDeprivation(station, options);
    });
}

function executeDeprivation(station: string, options: DeprivationOptions): void {
  const { config } = getCliContext();
  const registry = loadRegistry(config.paths.registry);
  const inputs = fileDeprivationInputs({
    lsoaLookup: options.lookup ? resolve(options.lookup) : config.paths.lsoaLookup,
    imd: options.imd ? resolve(options.imd) : config.paths.imd,
  })();

  const profile = buildDeprivationProfile(registry, station, inputs.lookup, inputs.imd);
  printOutput(
    renderDeprivation(profile, resolveFormat(options.format, config.json), options.areas ?? false)
  );
}

const DISTRIBUTION_COLUMNS: readonly TableColumn[] = [
  { key: 'quintile', header: 'Deprivation Quintile' },
  { key: 'count', header: 'Areas', align: 'right' },
  { key: 'percentage', header: 'Share', align: 'right', formatter: formatters.percent },
];

const DOMAIN_HEADERS: Readonly<Record<DeprivationDomain, string>> = {
  income: 'Income',
  employment: 'Employment',
  education: 'Education',
  health: 'Health',
  crime: 'Crime',
  barriers: 'Barriers',
  livingEnvironment: 'Living Environment',
};

const DOMAINS: readonly DeprivationDomain[] = [
  'income',
  'employment',
  'education',
  'health',
  'crime',
  'barriers',
  'livingEnvironment',
];

const decile = (value: unknown): string => (typeof value === 'number' ? String(value) : '-');

const AREA_COLUMNS: readonly TableColumn[] = [
  { key: 'areaCode', header: 'LSOA Code' },
  { key: 'areaName', header: 'LSOA Name' },
  { key: 'imdRank', header: 'IMD Rank', align: 'right', formatter: formatters.count },
  { key: 'imdDecile', header: 'IMD Decile', align: 'right', formatter: decile },
  ...DOMAINS.map(
    (domain): TableColumn => ({ key: domain, header: DOMAIN_HEADERS[domain], align: 'right', formatter: decile })
  ),
  { key: 'quintile', header: 'Quintile', align: 'right' },
];

/**
 * One row per classified quintile, most deprived first
 */
export function distributionRows(profile: Extract<DeprivationProfile, { status: 'joined' }>): Row[] {
  return CLASSIFIED_QUINTILES.map((q) => ({
    quintile: QUINTILE_LABELS[q],
    count: profile.distribution.counts[q],
    percentage: profile.distribution.percentages[q],
  }));
}

export function renderDeprivation(
  profile: DeprivationProfile,
  format: OutputFormat,
  includeAreas: boolean
): string {
  if (format === 'json') {
    return formatJson(profile);
  }
  if (profile.status === 'no-join') {
    return `No LSOAs matched the wards of ${profile.station}: ${profile.wardNames.join(', ')}`;
  }

  const distribution = distributionRows(profile);
  const areas: Row[] = profile.areas.map((area) => ({
    areaCode: area.areaCode,
    areaName: area.areaName,
    imdRank: area.imdRank,
    imdDecile: area.imdDecile,
    ...area.domainDeciles,
    quintile: area.quintile,
  }));

  if (format === 'csv') {
    return includeAreas ? formatCsv(areas, AREA_COLUMNS) : formatCsv(distribution, DISTRIBUTION_COLUMNS);
  }

  const sections = [
    `${profile.station}: ${profile.distribution.total} LSOAs (${profile.strategy} ward match, ${profile.distribution.unclassified} unclassified)`,
    formatTable(distribution, DISTRIBUTION_COLUMNS),
  ];
  if (includeAreas) {
    sections.push(formatTable(areas, AREA_COLUMNS));
  }
  return sections.join('\n\n');
}
