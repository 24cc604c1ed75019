/**
 * Response Value Extractor
 *
 * Reads N category percentages from a raw value array. The statistics
 * service returns either interleaved `[count, pct, count, pct, ...]` pairs
 * or a flat `[pct, pct, ...]` array; the paired layout wins whenever the
 * array is long enough to hold it.
 *
 * Every dimension goes through this function with N = taxonomy size,
 * "Total" included.
 */

import type { ExtractionResult } from '../core/types.js';

const UNAVAILABLE: ExtractionResult = { kind: 'unavailable' };

/**
 * Convert one raw element to a number; `undefined` when it is not numeric.
 * Finite numbers and numeric strings convert, everything else fails.
 */
export function toNumber(raw: unknown): number | undefined {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? raw : undefined;
  }
  if (typeof raw === 'string' && raw.trim() !== '') {
    const parsed = Number(raw.trim());
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function convertAll(values: readonly unknown[]): ExtractionResult {
  const converted: number[] = [];
  for (const raw of values) {
    const value = toNumber(raw);
    if (value === undefined) {
      return UNAVAILABLE;
    }
    converted.push(value);
  }
  return { kind: 'percentages', values: converted };
}

/**
 * @param raw - Raw `value` array, or null when the fetch produced nothing
 * @param categoryCount - Taxonomy size including "Total"
 * @throws {RangeError} If categoryCount is not a positive integer
 */
export function extractPercentages(
  raw: readonly unknown[] | null | undefined,
  categoryCount: number
): ExtractionResult {
  if (!Number.isInteger(categoryCount) || categoryCount < 1) {
    throw new RangeError(`categoryCount must be a positive integer, got ${categoryCount}`);
  }
  if (raw === null || raw === undefined) {
    return UNAVAILABLE;
  }

  if (raw.length >= 2 * categoryCount) {
    const percentages: unknown[] = [];
    for (let i = 1; i < 2 * categoryCount; i += 2) {
      percentages.push(raw[i]);
    }
    return convertAll(percentages);
  }

  if (raw.length >= categoryCount) {
    return convertAll(raw.slice(0, categoryCount));
  }

  return UNAVAILABLE;
}

/**
 * Unwrap an extraction result to its values, or `null` when unavailable
 */
export function percentagesOrNull(result: ExtractionResult): readonly number[] | null {
  return result.kind === 'percentages' ? result.values : null;
}

export function isAvailable(
  result: ExtractionResult
): result is Extract<ExtractionResult, { kind: 'percentages' }> {
  return result.kind === 'percentages';
}
