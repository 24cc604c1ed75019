/**
 * IMD Table Tests
 *
 * KEY TEST CASES:
 * - Long published headers located by keyword
 * - Optional rank and domain columns
 * - Missing decile or code column raises DataSourceError
 */

import { describe, test, expect } from 'vitest';
import { findLsoaCodeColumn, loadImdTable, parseImdTable } from '../../../ingestion/imd.js';
import { parseCsv } from '../../../ingestion/csv.js';
import { DataSourceError } from '../../../core/errors.js';
import { fixturePath } from '../../fixtures/paths.js';

describe('parseImdTable', () => {
  test('reads rank, decile and domain deciles keyed by area code', () => {
    const records = loadImdTable(fixturePath('imd.csv'));

    expect(records.size).toBe(2);
    expect(records.get('E01000010')).toEqual({
      areaCode: 'E01000010',
      imdRank: 9000,
      imdDecile: 3,
      domainDeciles: {
        income: 4,
        employment: null,
        education: null,
        health: null,
        crime: null,
        barriers: null,
        livingEnvironment: 2,
      },
    });
    expect(records.get('E01000011')?.domainDeciles.livingEnvironment).toBeNull();
  });

  test('keeps the first record for a repeated code', () => {
    const table = parseCsv('LSOA21CD,IMD Decile\nE01000001,2\nE01000001,9\n');

    expect(parseImdTable(table).get('E01000001')?.imdDecile).toBe(2);
  });

  test('raises DataSourceError without a decile column', () => {
    const table = parseCsv('LSOA21CD,IMD Rank\nE01000001,10\n');

    expect(() => parseImdTable(table, 'imd.csv')).toThrow(DataSourceError);
    expect(() => parseImdTable(table, 'imd.csv')).toThrow(/Could not find IMD Decile column/);
  });

  test('raises DataSourceError without a code column', () => {
    const table = parseCsv('Name,IMD Decile\nLewisham 001A,1\n');

    expect(() => parseImdTable(table)).toThrow(/Could not find LSOA code column/);
  });
});

describe('findLsoaCodeColumn', () => {
  test('prefers known headers, then anything mentioning lsoa', () => {
    expect(findLsoaCodeColumn(['LSOA name (2021)', 'LSOA code (2021)'])).toBe('LSOA code (2021)');
    expect(findLsoaCodeColumn(['Area', 'lsoa_code'])).toBe('lsoa_code');
    expect(findLsoaCodeColumn(['Area', 'Decile'])).toBeUndefined();
  });
});
