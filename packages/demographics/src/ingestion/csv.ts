/**
 * CSV reading and header lookup for reference data files
 *
 * Headers are not stable across data releases, so columns are located by
 * a prioritised list of keyword candidates: the first candidate that is a
 * case-insensitive substring of any header wins. A renamed upstream header
 * that no longer contains any candidate makes the lookup fail.
 */

import { readFileSync } from 'node:fs';
import { parse } from 'csv-parse/sync';
import { DataSourceError, errorMessage, type DataSourceName } from '../core/errors.js';

export type CsvRecord = Readonly<Record<string, string>>;

export interface CsvTable {
  readonly headers: readonly string[];
  readonly rows: readonly CsvRecord[];
}

/**
 * Parse CSV text with a header row. A leading byte-order mark is dropped
 * and every cell is kept as a string.
 */
export function parseCsv(content: string): CsvTable {
  const text = content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
  const records: string[][] = parse(text, {
    skip_empty_lines: true,
    relax_column_count: true,
  });

  const [headerRow, ...dataRows] = records;
  if (headerRow === undefined) {
    return { headers: [], rows: [] };
  }

  const headers = headerRow.map((h) => h.trim());
  const rows = dataRows.map((cells) => {
    const record: Record<string, string> = {};
    headers.forEach((header, i) => {
      record[header] = cells[i] ?? '';
    });
    return record;
  });

  return { headers, rows };
}

/**
 * @throws {DataSourceError} If the file is missing or not parseable
 */
export function readCsvFile(path: string, source: DataSourceName): CsvTable {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new DataSourceError(`Could not load ${source} CSV at ${path}: ${errorMessage(error)}`, {
      source,
      path,
      cause: error,
    });
  }

  try {
    return parseCsv(content);
  } catch (error) {
    throw new DataSourceError(`Could not parse ${source} CSV at ${path}: ${errorMessage(error)}`, {
      source,
      path,
      cause: error,
    });
  }
}

/**
 * First header matched by the highest-priority candidate, or `undefined`
 */
export function findColumn(
  headers: readonly string[],
  candidates: readonly string[]
): string | undefined {
  for (const candidate of candidates) {
    const needle = candidate.toLowerCase();
    const match = headers.find((header) => header.toLowerCase().includes(needle));
    if (match !== undefined) {
      return match;
    }
  }
  return undefined;
}

/**
 * Parse a numeric cell; blanks and non-numbers become `null`
 */
export function parseNumericCell(value: string | undefined): number | null {
  if (value === undefined) {
    return null;
  }
  const trimmed = value.replace(/,/g, '').trim();
  if (trimmed === '') {
    return null;
  }
  const num = Number(trimmed);
  return Number.isFinite(num) ? num : null;
}
