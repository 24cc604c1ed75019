/**
 * Fine-area (LSOA) to ward lookup
 */

import { DataSourceError } from '../core/errors.js';
import type { JoinRecord } from '../core/types.js';
import { findColumn, readCsvFile, type CsvTable } from './csv.js';

export const LSOA_CODE_CANDIDATES = ['LSOA21CD', 'LSOA11CD', 'LSOA code'] as const;
export const LSOA_NAME_CANDIDATES = ['LSOA21NM', 'LSOA11NM', 'LSOA name'] as const;
export const WARD_NAME_CANDIDATES = ['WD22NM', 'WD23NM', 'WD24NM', 'Ward name'] as const;

/**
 * Join records from a parsed lookup table. The fine-area name falls back
 * to its code when the table has no name column.
 *
 * @throws {DataSourceError} If the code or ward column is missing
 */
export function parseLsoaLookup(table: CsvTable, path?: string): JoinRecord[] {
  const codeColumn = findColumn(table.headers, LSOA_CODE_CANDIDATES);
  const wardColumn = findColumn(table.headers, WARD_NAME_CANDIDATES);
  const nameColumn = findColumn(table.headers, LSOA_NAME_CANDIDATES);

  if (codeColumn === undefined) {
    throw new DataSourceError('LSOA code column not found in LSOA lookup', {
      source: 'lsoa-lookup',
      path,
      column: 'LSOA21CD',
    });
  }
  if (wardColumn === undefined) {
    throw new DataSourceError('Ward name column not found in LSOA lookup', {
      source: 'lsoa-lookup',
      path,
      column: 'WD22NM',
    });
  }

  const records: JoinRecord[] = [];
  for (const row of table.rows) {
    const areaCode = (row[codeColumn] ?? '').trim();
    if (areaCode === '') {
      continue;
    }
    const name = nameColumn === undefined ? '' : (row[nameColumn] ?? '').trim();
    records.push({
      areaCode,
      areaName: name === '' ? areaCode : name,
      wardName: row[wardColumn] ?? '',
    });
  }
  return records;
}

/**
 * @throws {DataSourceError} If the file is missing, unreadable or lacks a required column
 */
export function loadLsoaLookup(path: string): JoinRecord[] {
  return parseLsoaLookup(readCsvFile(path, 'lsoa-lookup'), path);
}
