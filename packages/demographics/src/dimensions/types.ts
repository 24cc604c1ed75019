import type { DatasetKey, DimensionFilter } from '../core/types.js';

/**
 * Fixed grouping of taxonomy categories summed into one band
 */
export interface CategoryRollup {
  readonly label: string;
  readonly categories: readonly string[];
}

/**
 * One demographic dimension: which dataset to query, how to filter it,
 * and the ordered categories the response carries.
 */
export interface DimensionDefinition {
  readonly key: string;
  readonly label: string;
  /** Column heading for the category axis */
  readonly categoryLabel: string;
  readonly datasetKey: DatasetKey;
  readonly filter: DimensionFilter | null;
  /** Ordered categories, first entry always "Total" */
  readonly taxonomy: readonly string[];
  readonly rollups?: readonly CategoryRollup[];
}

export const TOTAL_CATEGORY = 'Total';
