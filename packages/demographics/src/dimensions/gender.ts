import type { DimensionDefinition } from './types.js';

// Sex (TS008) is queried unfiltered: Total, Female, Male.
export const GENDER_DIMENSION: DimensionDefinition = {
  key: 'gender',
  label: 'Gender Distribution',
  categoryLabel: 'Gender',
  datasetKey: 'gender',
  filter: null,
  taxonomy: ['Total', 'Female', 'Male'],
};
