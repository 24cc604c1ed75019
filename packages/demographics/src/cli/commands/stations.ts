/**
 * Station Commands
 *
 * Usage:
 *   eqia stations [--format <fmt>]
 *   eqia wards <station> [--format <fmt>]
 */

import type { Command } from 'commander';
import { loadRegistry, type StationRegistry } from '../../registry/station-registry.js';
import { getCliContext } from '../lib/context.js';
import { formatOutput, printOutput, resolveFormat, type OutputFormat, type TableColumn } from '../lib/output.js';

interface ListOptions {
  readonly format?: string;
}

export function registerStationsCommand(parent: Command): void {
  parent
    .command('stations')
    .description('List stations in the registry')
    .option('-f, --format <fmt>', 'Output format: table|json|csv', 'table')
    .action((options: ListOptions) => {
      const { config } = getCliContext();
      const registry = loadRegistry(config.paths.registry);
      printOutput(renderStations(registry, resolveFormat(options.format, config.json)));
    });

  parent
    .command('wards <station>')
    .description('List the wards making up a station Local Study Area')
    .option('-f, --format <fmt>', 'Output format: table|json|csv', 'table')
    .action((station: string, options: ListOptions) => {
      const { config } = getCliContext();
      const registry = loadRegistry(config.paths.registry);
      printOutput(renderWards(registry, station, resolveFormat(options.format, config.json)));
    });
}

const STATION_COLUMNS: readonly TableColumn[] = [
  { key: 'name', header: 'Station' },
  { key: 'wards', header: 'Wards', align: 'right' },
];

const WARD_COLUMNS: readonly TableColumn[] = [
  { key: 'name', header: 'Ward' },
  { key: 'areaCode', header: 'Area Code' },
];

export function renderStations(registry: StationRegistry, format: OutputFormat): string {
  const rows = registry.stations.map((station) => ({
    name: station.name,
    wards: station.wards.length,
  }));
  return formatOutput(rows, format, STATION_COLUMNS);
}

/**
 * @throws {StationNotFoundError} If the station is not in the registry
 */
export function renderWards(registry: StationRegistry, stationName: string, format: OutputFormat): string {
  const station = registry.getStation(stationName);
  const rows = station.wards.map((ward) => ({ name: ward.name, areaCode: ward.areaCode }));
  return formatOutput(rows, format, WARD_COLUMNS);
}
