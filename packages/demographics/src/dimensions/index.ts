/**
 * Demographic dimensions, in report order
 */

import { AGE_DIMENSION } from './age.js';
import { ETHNICITY_DIMENSION } from './ethnicity.js';
import { GENDER_DIMENSION } from './gender.js';
import { RELIGION_DIMENSION } from './religion.js';
import type { DimensionDefinition } from './types.js';

export { AGE_DIMENSION, ETHNICITY_DIMENSION, GENDER_DIMENSION, RELIGION_DIMENSION };
export { TOTAL_CATEGORY, type CategoryRollup, type DimensionDefinition } from './types.js';

export const DIMENSIONS: readonly DimensionDefinition[] = [
  AGE_DIMENSION,
  GENDER_DIMENSION,
  ETHNICITY_DIMENSION,
  RELIGION_DIMENSION,
];

export function findDimension(key: string): DimensionDefinition | undefined {
  return DIMENSIONS.find((dimension) => dimension.key === key.toLowerCase());
}
