import { describe, test, expect } from 'vitest';
import { summariseSeries } from '../../../services/series.js';

describe('summariseSeries', () => {
  test('returns mean, min and max rounded to one decimal', () => {
    const points = [
      { period: 'Q1', value: 10 },
      { period: 'Q2', value: 11 },
      { period: 'Q3', value: 11 },
    ];

    expect(summariseSeries(points)).toEqual({ average: 10.7, minimum: 10, maximum: 11 });
  });

  test('returns null for an empty series', () => {
    expect(summariseSeries([])).toBeNull();
  });
});
