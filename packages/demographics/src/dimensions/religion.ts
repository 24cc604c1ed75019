import type { DimensionDefinition } from './types.js';

export const RELIGION_DIMENSION: DimensionDefinition = {
  key: 'religion',
  label: 'Religion Distribution',
  categoryLabel: 'Religion',
  datasetKey: 'religion',
  filter: { c2021_religion_10: '0...9' },
  taxonomy: [
    'Total',
    'No religion',
    'Christian',
    'Buddhist',
    'Hindu',
    'Jewish',
    'Muslim',
    'Sikh',
    'Other religion',
    'Not answered',
  ],
};
