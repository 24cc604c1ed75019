/**
 * Core domain types
 *
 * Stations, wards and comparison areas come from the static registry;
 * every other structure here is a derived, read-only view recomputed per
 * request.
 */

// ============================================================================
// Geography
// ============================================================================

/**
 * Administrative ward in a station's catchment.
 * The same area code may appear under several wards and stations.
 */
export interface Ward {
  readonly name: string;
  /** Opaque geography identifier understood by the statistics service */
  readonly areaCode: string;
}

export interface Station {
  readonly name: string;
  /** Insertion order; at least one ward */
  readonly wards: readonly Ward[];
}

export type ComparisonLevel = 'borough' | 'region' | 'country';

export interface ComparisonArea {
  readonly name: string;
  readonly areaCode: string;
  readonly level: ComparisonLevel;
}

/**
 * Display name of the aggregated ward set
 */
export const LOCAL_STUDY_AREA = 'Local Study Area';

/**
 * Logical statistics datasets the registry maps to service identifiers
 */
export type DatasetKey =
  | 'population'
  | 'age'
  | 'ethnicity'
  | 'religion'
  | 'gender'
  | 'disability';

/**
 * Query-string filter narrowing a dataset to a dimension's categories
 */
export type DimensionFilter = Readonly<Record<string, string>>;

// ============================================================================
// Extraction
// ============================================================================

/**
 * Result of reading percentages out of a raw value array.
 * Tagged so a raw array can never pass for extracted percentages.
 */
export type ExtractionResult =
  | { readonly kind: 'unavailable' }
  | { readonly kind: 'percentages'; readonly values: readonly number[] };

// ============================================================================
// Comparative tables
// ============================================================================

export interface ComparativeRow {
  readonly area: string;
  readonly category: string;
  /** `null` when the area's series is missing or too short */
  readonly percentage: number | null;
}

export interface ComparativeTable {
  readonly station: string;
  readonly dimension: string;
  /** Canonical area order: Local Study Area, then the comparison areas */
  readonly areas: readonly string[];
  /** Taxonomy order without the leading "Total" */
  readonly categories: readonly string[];
  readonly rows: readonly ComparativeRow[];
}

export type DimensionResult =
  | {
      readonly status: 'available';
      readonly dimension: string;
      readonly table: ComparativeTable;
    }
  | {
      readonly status: 'unavailable';
      readonly dimension: string;
      readonly reason: string;
    };

/**
 * One category row of a pivoted table: a value per area, in area order
 */
export interface PivotRow {
  readonly category: string;
  readonly values: Readonly<Record<string, number | null>>;
}

export interface PivotTable {
  readonly dimension: string;
  readonly areas: readonly string[];
  readonly rows: readonly PivotRow[];
}

// ============================================================================
// Deprivation
// ============================================================================

/**
 * Row of the fine-area to ward lookup. Many fine areas per ward.
 */
export interface JoinRecord {
  readonly areaCode: string;
  readonly areaName: string;
  readonly wardName: string;
}

/**
 * Fine statistical area resolved from a ward name
 */
export interface AreaRecord {
  readonly areaCode: string;
  readonly areaName: string;
}

export type DeprivationDomain =
  | 'income'
  | 'employment'
  | 'education'
  | 'health'
  | 'crime'
  | 'barriers'
  | 'livingEnvironment';

export interface DeprivationRecord {
  readonly areaCode: string;
  readonly imdRank: number | null;
  /** 1–10, 1 = most deprived */
  readonly imdDecile: number | null;
  readonly domainDeciles: Readonly<Record<DeprivationDomain, number | null>>;
}

/** 1–5, 1 = most deprived; 0 = unclassified */
export type Quintile = 0 | 1 | 2 | 3 | 4 | 5;
