/**
 * Geographic Name Matcher
 *
 * Resolves free-text ward names to fine statistical areas through a
 * lookup table keyed by ward name.
 *
 * STRATEGY:
 * 1. Exact: normalized ward name equals normalized lookup ward name
 * 2. Contains: only if (1) matched nothing for every ward, any lookup row
 *    whose normalized ward name contains a normalized target name.
 *    Favors recall; it can over-match when one ward name is a substring
 *    of another ("Lewisham" in "Lewisham Central").
 */

import type { AreaRecord, JoinRecord } from '../core/types.js';

const APOSTROPHES = /['’]/g;
const NON_WORD = /[^\p{L}\p{N}\s]/gu;
const WHITESPACE = /\s+/g;

/**
 * Lowercase, "&" to "and", drop apostrophes and punctuation, collapse
 * whitespace. Idempotent.
 *
 * @example normalizeAreaName("St George's") === 'st georges'
 */
export function normalizeAreaName(name: string | null | undefined): string {
  if (name === null || name === undefined) {
    return '';
  }
  return name
    .toLowerCase()
    .replace(/&/g, 'and')
    .replace(APOSTROPHES, '')
    .replace(NON_WORD, '')
    .replace(WHITESPACE, ' ')
    .trim();
}

export type MatchStrategy = 'exact' | 'contains';

export type WardMatchResult =
  | {
      readonly status: 'matched';
      readonly strategy: MatchStrategy;
      readonly areas: readonly AreaRecord[];
    }
  | { readonly status: 'no-match' };

function collect(
  joinTable: readonly JoinRecord[],
  predicate: (normalizedWard: string) => boolean
): AreaRecord[] {
  const seen = new Set<string>();
  const areas: AreaRecord[] = [];

  for (const record of joinTable) {
    if (!predicate(normalizeAreaName(record.wardName))) {
      continue;
    }
    const key = `${record.areaCode}\u0000${record.areaName}`;
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    areas.push({ areaCode: record.areaCode, areaName: record.areaName });
  }

  return areas;
}

/**
 * Fine areas belonging to the given wards, deduplicated on (code, name),
 * in lookup-table order
 */
export function matchWardsToAreas(
  wardNames: Iterable<string>,
  joinTable: readonly JoinRecord[]
): WardMatchResult {
  const targets = new Set<string>();
  for (const name of wardNames) {
    const normalized = normalizeAreaName(name);
    if (normalized !== '') {
      targets.add(normalized);
    }
  }

  if (targets.size === 0) {
    return { status: 'no-match' };
  }

  const exact = collect(joinTable, (ward) => targets.has(ward));
  if (exact.length > 0) {
    return { status: 'matched', strategy: 'exact', areas: exact };
  }

  const contains = collect(joinTable, (ward) =>
    [...targets].some((target) => ward.includes(target))
  );
  if (contains.length > 0) {
    return { status: 'matched', strategy: 'contains', areas: contains };
  }

  return { status: 'no-match' };
}
