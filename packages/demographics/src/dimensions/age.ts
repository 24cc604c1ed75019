import type { DimensionDefinition } from './types.js';

/**
 * Census 2021 TS007A age bands
 */
export const AGE_DIMENSION: DimensionDefinition = {
  key: 'age',
  label: 'Age Distribution',
  categoryLabel: 'Age Band',
  datasetKey: 'age',
  filter: { c2021_age_12a: '0...11' },
  taxonomy: [
    'Total',
    '0-4',
    '5-9',
    '10-15',
    '16-19',
    '20-24',
    '25-34',
    '35-49',
    '50-64',
    '65-74',
    '75-84',
    '85+',
  ],
  rollups: [
    { label: '0-15', categories: ['0-4', '5-9', '10-15'] },
    { label: '16-64', categories: ['16-19', '20-24', '25-34', '35-49', '50-64'] },
    { label: '65+', categories: ['65-74', '75-84', '85+'] },
  ],
};
