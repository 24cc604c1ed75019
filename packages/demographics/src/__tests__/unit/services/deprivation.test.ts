/**
 * Deprivation Profile Tests
 *
 * KEY TEST CASES:
 * - Decile to quintile pairing, unclassified values
 * - Distribution percentages over all matched areas
 * - Left join of matched areas onto IMD records, sorted by rank
 * - No-join when no ward matches
 */

import { describe, test, expect } from 'vitest';
import {
  buildDeprivationProfile,
  decileToQuintile,
  quintileDistribution,
  QUINTILE_LABELS,
} from '../../../services/deprivation.js';
import { createRegistry } from '../../../registry/station-registry.js';
import type { DeprivationRecord, JoinRecord } from '../../../core/types.js';
import { testRegistryData } from '../../fixtures/registry.js';

function imdRecord(areaCode: string, imdRank: number, imdDecile: number): DeprivationRecord {
  return {
    areaCode,
    imdRank,
    imdDecile,
    domainDeciles: {
      income: imdDecile,
      employment: null,
      education: null,
      health: null,
      crime: null,
      barriers: null,
      livingEnvironment: null,
    },
  };
}

describe('decileToQuintile', () => {
  test('pairs deciles into quintiles', () => {
    const quintiles = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10].map((d) => decileToQuintile(d));

    expect(quintiles).toEqual([1, 1, 2, 2, 3, 3, 4, 4, 5, 5]);
  });

  test('leaves missing and invalid deciles unclassified', () => {
    expect(decileToQuintile(null)).toBe(0);
    expect(decileToQuintile(undefined)).toBe(0);
    expect(decileToQuintile(0)).toBe(0);
    expect(decileToQuintile(11)).toBe(0);
    expect(decileToQuintile(2.5)).toBe(0);
  });
});

describe('quintileDistribution', () => {
  test('splits one area per decile evenly across quintiles', () => {
    const records = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10].map((d) => ({ quintile: decileToQuintile(d) }));

    const distribution = quintileDistribution(records);

    expect(distribution.percentages).toEqual({ 1: 20, 2: 20, 3: 20, 4: 20, 5: 20 });
    expect(distribution.total).toBe(10);
    expect(distribution.unclassified).toBe(0);
  });

  test('keeps unclassified areas in the denominator', () => {
    const distribution = quintileDistribution([{ quintile: 1 }, { quintile: 1 }, { quintile: 5 }, { quintile: 0 }]);

    expect(distribution.percentages).toEqual({ 1: 50, 2: 0, 3: 0, 4: 0, 5: 25 });
    expect(distribution.counts[0]).toBe(1);
    expect(distribution.unclassified).toBe(1);
  });

  test('returns zero shares for no areas', () => {
    expect(quintileDistribution([]).percentages).toEqual({ 1: 0, 2: 0, 3: 0, 4: 0, 5: 0 });
  });
});

describe('QUINTILE_LABELS', () => {
  test('runs from most to least deprived', () => {
    expect(QUINTILE_LABELS[1]).toBe('Most Deprived 20%');
    expect(QUINTILE_LABELS[5]).toBe('Least Deprived 20%');
  });
});

describe('buildDeprivationProfile', () => {
  const registry = createRegistry(testRegistryData());
  const lookup: JoinRecord[] = [
    { areaCode: 'E01000010', areaName: 'Lewisham 001A', wardName: 'Brockley' },
    { areaCode: 'E01000011', areaName: 'Lewisham 001B', wardName: 'Brockley' },
    { areaCode: 'E01000012', areaName: 'Lewisham 002A', wardName: 'Deptford' },
    { areaCode: 'E01000013', areaName: 'Southwark 001A', wardName: 'Faraday' },
  ];
  const imd = new Map<string, DeprivationRecord>([
    ['E01000010', imdRecord('E01000010', 9000, 3)],
    ['E01000011', imdRecord('E01000011', 1200, 1)],
    ['E01000013', imdRecord('E01000013', 500, 1)],
  ]);

  test('joins matched areas onto IMD records, most deprived first', () => {
    const profile = buildDeprivationProfile(registry, 'Lewisham Way Shaft', lookup, imd);

    expect(profile.status).toBe('joined');
    if (profile.status !== 'joined') return;
    expect(profile.strategy).toBe('exact');
    expect(profile.areas.map((a) => [a.areaCode, a.imdRank, a.quintile])).toEqual([
      ['E01000011', 1200, 1],
      ['E01000010', 9000, 2],
      ['E01000012', null, 0],
    ]);
    expect(profile.areas[0].domainDeciles.income).toBe(1);
    expect(profile.areas[2].domainDeciles.income).toBeNull();
  });

  test('computes the distribution over every matched area', () => {
    const profile = buildDeprivationProfile(registry, 'Lewisham Way Shaft', lookup, imd);

    if (profile.status !== 'joined') throw new Error('expected a joined profile');
    expect(profile.distribution.total).toBe(3);
    expect(profile.distribution.counts).toEqual({ 0: 1, 1: 1, 2: 1, 3: 0, 4: 0, 5: 0 });
    expect(profile.distribution.percentages[1]).toBeCloseTo(33.333, 3);
  });

  test('reports no-join with the ward names when nothing matches', () => {
    const profile = buildDeprivationProfile(registry, 'Old Kent Road 1', lookup.slice(0, 3), imd);

    expect(profile).toEqual({
      status: 'no-join',
      station: 'Old Kent Road 1',
      wardNames: ['Old Kent Road', 'Faraday', "St George's"],
    });
  });
});
