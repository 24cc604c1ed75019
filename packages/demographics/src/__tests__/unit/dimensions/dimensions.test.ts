/**
 * Dimension Definition Tests
 */

import { describe, test, expect } from 'vitest';
import { DIMENSIONS, TOTAL_CATEGORY, findDimension } from '../../../dimensions/index.js';

describe('dimension definitions', () => {
  test('report order is age, gender, ethnicity, religion', () => {
    expect(DIMENSIONS.map((d) => d.key)).toEqual(['age', 'gender', 'ethnicity', 'religion']);
  });

  test('taxonomy sizes include Total', () => {
    expect(DIMENSIONS.map((d) => d.taxonomy.length)).toEqual([12, 3, 6, 10]);
  });

  test.each(DIMENSIONS.map((d) => [d.key, d] as const))('%s taxonomy starts with Total', (_key, dimension) => {
    expect(dimension.taxonomy[0]).toBe(TOTAL_CATEGORY);
  });

  test('age rollups cover every non-Total category once', () => {
    const age = findDimension('age');
    const covered = age?.rollups?.flatMap((r) => r.categories) ?? [];

    expect(covered).toEqual(age?.taxonomy.slice(1));
  });

  test('lookup is case-insensitive', () => {
    expect(findDimension('ETHNICITY')?.label).toBe('Ethnicity Distribution');
    expect(findDimension('disability')).toBeUndefined();
  });
});
