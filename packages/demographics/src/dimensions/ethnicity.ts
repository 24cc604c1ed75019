import type { DimensionDefinition } from './types.js';

/**
 * Five high-level ethnic groups, in the order the service returns them
 */
export const ETHNICITY_DIMENSION: DimensionDefinition = {
  key: 'ethnicity',
  label: 'Ethnicity Distribution',
  categoryLabel: 'Ethnic Group',
  datasetKey: 'ethnicity',
  filter: { c2021_eth_20: '0,1001...1005' },
  taxonomy: [
    'Total',
    'Asian, Asian British or Asian Welsh',
    'Black, Black British, Black Welsh, Caribbean or African',
    'Mixed or Multiple ethnic groups',
    'White',
    'Other ethnic group',
  ],
};
