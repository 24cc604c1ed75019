/**
 * Deprivation profile of a Local Study Area
 *
 * Ward names → fine areas (name matcher) → IMD records (left join) →
 * quintile buckets → share of fine areas per quintile.
 */

import type {
  AreaRecord,
  DeprivationDomain,
  DeprivationRecord,
  JoinRecord,
  Quintile,
} from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import type { StationRegistry } from '../registry/station-registry.js';
import { matchWardsToAreas, type MatchStrategy } from './name-matcher.js';

const logger = createLogger({ module: 'deprivation' });

export const QUINTILE_LABELS: Readonly<Record<Exclude<Quintile, 0>, string>> = {
  1: 'Most Deprived 20%',
  2: 'More Deprived 20%',
  3: 'Middle 20%',
  4: 'Less Deprived 20%',
  5: 'Least Deprived 20%',
};

export const CLASSIFIED_QUINTILES = [1, 2, 3, 4, 5] as const;

/**
 * Pair deciles into quintiles: {1,2}→1 … {9,10}→5.
 * Missing, fractional or out-of-range deciles are unclassified (0).
 */
export function decileToQuintile(decile: number | null | undefined): Quintile {
  if (decile === null || decile === undefined || !Number.isInteger(decile)) {
    return 0;
  }
  switch (decile) {
    case 1:
    case 2:
      return 1;
    case 3:
    case 4:
      return 2;
    case 5:
    case 6:
      return 3;
    case 7:
    case 8:
      return 4;
    case 9:
    case 10:
      return 5;
    default:
      return 0;
  }
}

export interface QuintileDistribution {
  /** Areas per quintile, unclassified under 0 */
  readonly counts: Readonly<Record<Quintile, number>>;
  /** Share of all matched areas (unclassified included in the base) for 1–5 */
  readonly percentages: Readonly<Record<Exclude<Quintile, 0>, number>>;
  readonly total: number;
  readonly unclassified: number;
}

export function quintileDistribution(
  records: readonly { readonly quintile: Quintile }[]
): QuintileDistribution {
  const counts: Record<Quintile, number> = { 0: 0, 1: 0, 2: 0, 3: 0, 4: 0, 5: 0 };
  for (const record of records) {
    counts[record.quintile] += 1;
  }

  const total = records.length;
  const share = (count: number): number => (total === 0 ? 0 : (count / total) * 100);

  return {
    counts,
    percentages: {
      1: share(counts[1]),
      2: share(counts[2]),
      3: share(counts[3]),
      4: share(counts[4]),
      5: share(counts[5]),
    },
    total,
    unclassified: counts[0],
  };
}

export interface DeprivationArea extends AreaRecord {
  readonly imdRank: number | null;
  readonly imdDecile: number | null;
  readonly domainDeciles: Readonly<Record<DeprivationDomain, number | null>>;
  readonly quintile: Quintile;
}

export type DeprivationProfile =
  | {
      readonly status: 'joined';
      readonly station: string;
      readonly strategy: MatchStrategy;
      /** Most deprived first; unranked areas last */
      readonly areas: readonly DeprivationArea[];
      readonly distribution: QuintileDistribution;
    }
  | {
      readonly status: 'no-join';
      readonly station: string;
      readonly wardNames: readonly string[];
    };

const EMPTY_DOMAINS: Readonly<Record<DeprivationDomain, number | null>> = {
  income: null,
  employment: null,
  education: null,
  health: null,
  crime: null,
  barriers: null,
  livingEnvironment: null,
};

function compareRank(a: DeprivationArea, b: DeprivationArea): number {
  if (a.imdRank === null) return b.imdRank === null ? 0 : 1;
  if (b.imdRank === null) return -1;
  return a.imdRank - b.imdRank;
}

/**
 * @throws {StationNotFoundError} If the station is not in the registry
 */
export function buildDeprivationProfile(
  registry: StationRegistry,
  stationName: string,
  lookup: readonly JoinRecord[],
  imd: ReadonlyMap<string, DeprivationRecord>
): DeprivationProfile {
  const station = registry.getStation(stationName);
  const wardNames = station.wards.map((w) => w.name);
  const match = matchWardsToAreas(wardNames, lookup);

  if (match.status === 'no-match') {
    logger.warn('No fine areas matched the station wards', { station: stationName, wardNames });
    return { status: 'no-join', station: stationName, wardNames };
  }

  const areas = match.areas
    .map((area): DeprivationArea => {
      const record = imd.get(area.areaCode);
      return {
        ...area,
        imdRank: record?.imdRank ?? null,
        imdDecile: record?.imdDecile ?? null,
        domainDeciles: record?.domainDeciles ?? EMPTY_DOMAINS,
        quintile: decileToQuintile(record?.imdDecile),
      };
    })
    .sort(compareRank);

  const unjoined = areas.filter((a) => !imd.has(a.areaCode)).length;
  if (unjoined > 0) {
    logger.info('Fine areas without IMD records', { station: stationName, unjoined });
  }

  return {
    status: 'joined',
    station: stationName,
    strategy: match.strategy,
    areas,
    distribution: quintileDistribution(areas),
  };
}
