import { roundTo } from '../core/utils/round.js';

export interface SeriesPoint {
  /** Period label: year, quarter or YYYY-MM month */
  readonly period: string;
  readonly value: number;
}

export interface NamedSeries {
  readonly name: string;
  readonly points: readonly SeriesPoint[];
}

export interface SeriesSummary {
  readonly average: number;
  readonly minimum: number;
  readonly maximum: number;
}

/**
 * Mean, min and max of a series, rounded to one decimal
 */
export function summariseSeries(points: readonly SeriesPoint[]): SeriesSummary | null {
  if (points.length === 0) {
    return null;
  }
  const values = points.map((p) => p.value);
  const sum = values.reduce((acc, v) => acc + v, 0);
  return {
    average: roundTo(sum / values.length, 1),
    minimum: roundTo(Math.min(...values), 1),
    maximum: roundTo(Math.max(...values), 1),
  };
}
