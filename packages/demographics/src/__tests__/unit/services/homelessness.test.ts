/**
 * Homelessness Summary Tests
 */

import { describe, test, expect } from 'vitest';
import { dataRows, quarterColumns, summariseHomelessness } from '../../../services/homelessness.js';
import { parseCsv, readCsvFile } from '../../../ingestion/csv.js';
import { DataSourceError } from '../../../core/errors.js';
import { fixturePath } from '../../fixtures/paths.js';

const table = readCsvFile(fixturePath('homelessness.csv'), 'homelessness');

describe('homelessness data', () => {
  test('drops footnote rows under the data', () => {
    expect(dataRows(table).map((row) => row.Area)).toEqual([
      'Lambeth',
      'Southwark',
      'Lewisham',
      'Greater London Authority',
    ]);
  });

  test('treats headers containing Q as quarters', () => {
    expect(quarterColumns(table)).toEqual(['2023-24 Q1', '2023-24 Q2', '2023-24 Q3', '2023-24 Q4']);
  });

  test('summarises each requested borough and the region', () => {
    const summary = summariseHomelessness(table, ['Lambeth', 'Southwark', 'Greenwich'], 'Greater London Authority');

    expect(summary.boroughs.map((b) => [b.name, b.summary])).toEqual([
      ['Lambeth', { average: 120, minimum: 100, maximum: 140 }],
      ['Southwark', { average: 327.5, minimum: 90, maximum: 1010 }],
    ]);
    expect(summary.boroughs[0].points.map((p) => p.period)).toEqual(['2023-24 Q1', '2023-24 Q2', '2023-24 Q4']);
    expect(summary.region?.summary).toEqual({ average: 3300, minimum: 3000, maximum: 3600 });
  });

  test('has no region series when the region is not named', () => {
    expect(summariseHomelessness(table, ['Lewisham'], undefined).region).toBeNull();
  });

  test('raises DataSourceError without an Area column', () => {
    const broken = parseCsv('Borough,2023-24 Q1\nLambeth,1\n');

    expect(() => summariseHomelessness(broken, ['Lambeth'], undefined)).toThrow(DataSourceError);
  });
});
