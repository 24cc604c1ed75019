/**
 * Comparative Table Builder Tests
 *
 * KEY TEST CASES:
 * - Row layout: canonical area order × taxonomy order, Total excluded
 * - Missing Local Study Area keeps comparison cells populated
 * - Unavailable only when every series is missing
 * - Pivot rounding and broad age band rollups
 */

import { describe, test, expect, beforeEach } from 'vitest';
import {
  buildAllDimensions,
  buildComparativeTable,
  computeRollups,
  joinSeries,
  pivotTable,
} from '../../../services/table-builder.js';
import { AGE_DIMENSION, ETHNICITY_DIMENSION, GENDER_DIMENSION } from '../../../dimensions/index.js';
import { createRegistry, type StationRegistry } from '../../../registry/station-registry.js';
import type { ComparativeTable } from '../../../core/types.js';
import { FakeStatisticsSource } from '../../fixtures/statistics-source.js';
import {
  BOROUGH_CODE,
  COUNTRY_CODE,
  REGION_CODE,
  TEST_DATASETS,
  testRegistryData,
} from '../../fixtures/registry.js';

const STATION = 'Lewisham Way Shaft';

describe('joinSeries', () => {
  test('emits one row per area and category, skipping Total', () => {
    const rows = joinSeries(['Total', 'Female', 'Male'], [
      { area: 'Local Study Area', values: [100, 51, 49] },
      { area: 'Southwark', values: null },
    ]);

    expect(rows).toEqual([
      { area: 'Local Study Area', category: 'Female', percentage: 51 },
      { area: 'Local Study Area', category: 'Male', percentage: 49 },
      { area: 'Southwark', category: 'Female', percentage: null },
      { area: 'Southwark', category: 'Male', percentage: null },
    ]);
  });
});

describe('buildComparativeTable', () => {
  let registry: StationRegistry;
  let source: FakeStatisticsSource;

  beforeEach(() => {
    registry = createRegistry(testRegistryData());
    source = new FakeStatisticsSource();
  });

  test('builds the gender table from paired ward and area responses', async () => {
    source
      .respond(TEST_DATASETS.gender, '2001', [1000, 100, 520, 52, 480, 48])
      .respond(TEST_DATASETS.gender, '2002', [1000, 100, 500, 50, 500, 50])
      .respond(TEST_DATASETS.gender, BOROUGH_CODE, [100, 51.5, 48.5])
      .respond(TEST_DATASETS.gender, REGION_CODE, [100, 51.6, 48.4])
      .respond(TEST_DATASETS.gender, COUNTRY_CODE, [100, 51.0, 49.0]);

    const result = await buildComparativeTable({ registry, source }, STATION, GENDER_DIMENSION);

    expect(result.status).toBe('available');
    if (result.status !== 'available') return;
    expect(result.table.areas).toEqual(['Local Study Area', 'Southwark', 'London', 'England']);
    expect(result.table.categories).toEqual(['Female', 'Male']);
    expect(result.table.rows).toEqual([
      { area: 'Local Study Area', category: 'Female', percentage: 51 },
      { area: 'Local Study Area', category: 'Male', percentage: 49 },
      { area: 'Southwark', category: 'Female', percentage: 51.5 },
      { area: 'Southwark', category: 'Male', percentage: 48.5 },
      { area: 'London', category: 'Female', percentage: 51.6 },
      { area: 'London', category: 'Male', percentage: 48.4 },
      { area: 'England', category: 'Female', percentage: 51 },
      { area: 'England', category: 'Male', percentage: 49 },
    ]);
  });

  test('keeps comparison cells when the Local Study Area is missing', async () => {
    const pct = [100, 20, 25, 5, 45, 5];
    source
      .respond(TEST_DATASETS.ethnicity, BOROUGH_CODE, pct)
      .respond(TEST_DATASETS.ethnicity, REGION_CODE, pct)
      .respond(TEST_DATASETS.ethnicity, COUNTRY_CODE, [100, 10, 5, 3, 80, 2]);

    const result = await buildComparativeTable({ registry, source }, STATION, ETHNICITY_DIMENSION);

    expect(result.status).toBe('available');
    if (result.status !== 'available') return;
    const rows = result.table.rows;
    expect(rows).toHaveLength(20);
    expect(rows.filter((r) => r.area === 'Local Study Area').every((r) => r.percentage === null)).toBe(true);
    expect(rows.filter((r) => r.area !== 'Local Study Area' && r.percentage !== null)).toHaveLength(15);
    expect(rows.find((r) => r.area === 'England' && r.category === 'White')?.percentage).toBe(80);
  });

  test('reports unavailable when every series is missing', async () => {
    const result = await buildComparativeTable({ registry, source }, STATION, GENDER_DIMENSION);

    expect(result).toEqual({
      status: 'unavailable',
      dimension: 'gender',
      reason: 'Gender Distribution data not available for Lewisham Way Shaft',
    });
  });

  test('queries the dataset mapped to the dimension with its filter', async () => {
    await buildComparativeTable({ registry, source }, STATION, AGE_DIMENSION);

    expect(source.calls.map((c) => c.geographyCode)).toEqual([
      '2001',
      '2002',
      BOROUGH_CODE,
      REGION_CODE,
      COUNTRY_CODE,
    ]);
    expect(source.calls.every((c) => c.datasetId === TEST_DATASETS.age)).toBe(true);
    expect(source.calls[0].filter).toEqual({ c2021_age_12a: '0...11' });
  });
});

describe('buildAllDimensions', () => {
  test('returns one result per dimension in order, independently', async () => {
    const registry = createRegistry(testRegistryData());
    const source = new FakeStatisticsSource().respond(TEST_DATASETS.gender, BOROUGH_CODE, [100, 50, 50]);

    const results = await buildAllDimensions({ registry, source }, STATION);

    expect(results.map((r) => [r.dimension, r.status])).toEqual([
      ['age', 'unavailable'],
      ['gender', 'available'],
      ['ethnicity', 'unavailable'],
      ['religion', 'unavailable'],
    ]);
  });
});

function ageTable(lsa: readonly (number | null)[]): ComparativeTable {
  const categories = AGE_DIMENSION.taxonomy.slice(1);
  return {
    station: STATION,
    dimension: 'age',
    areas: ['Local Study Area', 'Southwark'],
    categories,
    rows: [
      ...categories.map((category, i) => ({ area: 'Local Study Area', category, percentage: lsa[i] })),
      ...categories.map((category) => ({ area: 'Southwark', category, percentage: 100 / 11 })),
    ],
  };
}

describe('pivotTable', () => {
  test('rounds values half away from zero to one decimal', () => {
    const table: ComparativeTable = {
      station: STATION,
      dimension: 'gender',
      areas: ['Local Study Area', 'Southwark'],
      categories: ['Female', 'Male'],
      rows: [
        { area: 'Local Study Area', category: 'Female', percentage: 50.25 },
        { area: 'Local Study Area', category: 'Male', percentage: 49.75 },
        { area: 'Southwark', category: 'Female', percentage: null },
        { area: 'Southwark', category: 'Male', percentage: 48.04 },
      ],
    };

    expect(pivotTable(table).rows).toEqual([
      { category: 'Female', values: { 'Local Study Area': 50.3, Southwark: null } },
      { category: 'Male', values: { 'Local Study Area': 49.8, Southwark: 48 } },
    ]);
  });
});

describe('computeRollups', () => {
  test('sums the age bands into 0-15, 16-64 and 65+', () => {
    const lsa = [5, 5, 6, 4, 8, 20, 22, 15, 8, 5, 2];
    const rollups = AGE_DIMENSION.rollups ?? [];

    const result = computeRollups(ageTable(lsa), rollups);

    expect(result.rows.map((r) => [r.category, r.values['Local Study Area']])).toEqual([
      ['0-15', 16],
      ['16-64', 69],
      ['65+', 15],
    ]);
  });

  test('leaves a band null when any constituent is missing', () => {
    const lsa = [5, null, 6, 4, 8, 20, 22, 15, 8, 5, 2];

    const result = computeRollups(ageTable(lsa), AGE_DIMENSION.rollups ?? []);

    expect(result.rows[0].values['Local Study Area']).toBeNull();
    expect(result.rows[1].values['Local Study Area']).toBe(69);
  });
});
