/**
 * Station Registry
 *
 * Immutable lookup of stations, their ward catchments, the three fixed
 * comparison areas and the dataset identifiers. Loaded once and passed
 * explicitly to every pipeline function.
 *
 * INVARIANTS:
 * - Every station has at least one ward; ward order is preserved
 * - Wards may share area codes, within and across stations
 * - Exactly three comparison areas, declared borough, region, country
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { DataSourceError, RegistryValidationError, StationNotFoundError, errorMessage } from '../core/errors.js';
import {
  LOCAL_STUDY_AREA,
  type ComparisonArea,
  type DatasetKey,
  type Station,
} from '../core/types.js';

// ============================================================================
// Schema
// ============================================================================

const WardSchema = z.object({
  name: z.string().min(1),
  areaCode: z.string().regex(/^\d+$/, 'area code must be numeric'),
});

const StationSchema = z.object({
  name: z.string().min(1),
  wards: z.array(WardSchema).min(1, 'station must have at least one ward'),
});

const ComparisonAreaSchema = z.object({
  name: z.string().min(1),
  areaCode: z.string().regex(/^\d+$/, 'area code must be numeric'),
  level: z.enum(['borough', 'region', 'country']),
});

const DatasetsSchema = z.object({
  population: z.string().min(1),
  age: z.string().min(1),
  ethnicity: z.string().min(1),
  religion: z.string().min(1),
  gender: z.string().min(1),
  disability: z.string().min(1),
});

export const RegistryDataSchema = z.object({
  stations: z.array(StationSchema).min(1),
  comparisonAreas: z.tuple([ComparisonAreaSchema, ComparisonAreaSchema, ComparisonAreaSchema]),
  datasets: DatasetsSchema,
  localAuthorities: z.array(z.string().min(1)).default([]),
  regionAuthority: z.string().min(1).optional(),
});

export type RegistryData = z.input<typeof RegistryDataSchema>;

// ============================================================================
// Registry
// ============================================================================

export interface StationRegistry {
  readonly stations: readonly Station[];
  readonly comparisonAreas: readonly ComparisonArea[];
  /** Boroughs summarised by the crime, homelessness and population views */
  readonly localAuthorities: readonly string[];
  readonly regionAuthority: string | undefined;
  /** Local Study Area, then comparison areas in declared order */
  readonly canonicalAreaOrder: readonly string[];
  listStations(): readonly string[];
  findStation(name: string): Station | undefined;
  /** @throws {StationNotFoundError} */
  getStation(name: string): Station;
  datasetId(key: DatasetKey): string;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

/**
 * Validate registry data and build the immutable registry
 *
 * @throws {RegistryValidationError} If the data fails the schema or has duplicate names
 */
export function createRegistry(data: unknown): StationRegistry {
  const parsed = RegistryDataSchema.safeParse(data);
  if (!parsed.success) {
    throw new RegistryValidationError(
      'Invalid station registry',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const { stations, comparisonAreas, datasets, localAuthorities, regionAuthority } =
    parsed.data;

  const byName = new Map<string, Station>();
  const duplicates: string[] = [];
  for (const station of stations) {
    if (byName.has(station.name)) {
      duplicates.push(`duplicate station name "${station.name}"`);
    }
    byName.set(station.name, station);
  }
  const areaNames = new Set<string>([LOCAL_STUDY_AREA]);
  for (const area of comparisonAreas) {
    if (areaNames.has(area.name)) {
      duplicates.push(`duplicate area name "${area.name}"`);
    }
    areaNames.add(area.name);
  }
  if (duplicates.length > 0) {
    throw new RegistryValidationError('Invalid station registry', duplicates);
  }

  const frozenStations = deepFreeze(stations);
  const frozenAreas = deepFreeze([...comparisonAreas]);
  const frozenDatasets = deepFreeze(datasets);

  return Object.freeze({
    stations: frozenStations,
    comparisonAreas: frozenAreas,
    localAuthorities: deepFreeze(localAuthorities),
    regionAuthority,
    canonicalAreaOrder: Object.freeze([LOCAL_STUDY_AREA, ...frozenAreas.map((a) => a.name)]),
    listStations: () => frozenStations.map((s) => s.name),
    findStation: (name: string) => byName.get(name),
    getStation(name: string): Station {
      const station = byName.get(name);
      if (!station) {
        throw new StationNotFoundError(name, [...byName.keys()]);
      }
      return station;
    },
    datasetId: (key: DatasetKey) => frozenDatasets[key],
  });
}

/**
 * Read and validate a registry JSON file
 *
 * @throws {DataSourceError} If the file cannot be read or parsed
 * @throws {RegistryValidationError} If the content is invalid
 */
export function loadRegistry(path: string): StationRegistry {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new DataSourceError(`Cannot load station registry: ${errorMessage(error)}`, {
      source: 'registry',
      path,
      cause: error,
    });
  }
  return createRegistry(raw);
}
