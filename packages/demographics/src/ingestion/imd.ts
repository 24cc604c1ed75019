/**
 * Index of Multiple Deprivation table
 *
 * Columns are located by keyword (see findColumn); only the overall IMD
 * decile is required, every other measure is optional.
 */

import { DataSourceError } from '../core/errors.js';
import type { DeprivationDomain, DeprivationRecord } from '../core/types.js';
import { findColumn, parseNumericCell, readCsvFile, type CsvTable } from './csv.js';

export const IMD_RANK_CANDIDATES = ['Index of Multiple Deprivation (IMD) Rank', 'imd rank'];
export const IMD_DECILE_CANDIDATES = ['Index of Multiple Deprivation (IMD) Decile', 'imd decile'];

export const DOMAIN_DECILE_CANDIDATES: Readonly<Record<DeprivationDomain, readonly string[]>> = {
  income: ['Income Decile'],
  employment: ['Employment Decile'],
  education: ['Education, Skills and Training Decile', 'Education Decile'],
  health: ['Health Deprivation and Disability Decile', 'Health Decile'],
  crime: ['Crime Decile'],
  barriers: ['Barriers to Housing and Services Decile', 'Barriers Decile'],
  livingEnvironment: ['Living Environment Decile'],
};

const EXACT_CODE_HEADERS = ['LSOA code (2021)', 'LSOA21CD', 'LSOA code'];

/**
 * LSOA code column: a known header verbatim, else the first header that
 * looks like one
 */
export function findLsoaCodeColumn(headers: readonly string[]): string | undefined {
  const exact = EXACT_CODE_HEADERS.find((candidate) => headers.includes(candidate));
  if (exact !== undefined) {
    return exact;
  }
  return headers.find((h) => h.toLowerCase().startsWith('e01') || h.toLowerCase().includes('lsoa'));
}

/**
 * Deprivation records keyed by fine-area code
 *
 * @throws {DataSourceError} If the IMD decile or LSOA code column is missing
 */
export function parseImdTable(table: CsvTable, path?: string): Map<string, DeprivationRecord> {
  const decileColumn = findColumn(table.headers, IMD_DECILE_CANDIDATES);
  if (decileColumn === undefined) {
    throw new DataSourceError(
      `Could not find IMD Decile column in IMD CSV. Columns found: ${table.headers.slice(0, 10).join(', ')}`,
      { source: 'imd', path, column: 'IMD Decile' }
    );
  }

  const codeColumn = findLsoaCodeColumn(table.headers);
  if (codeColumn === undefined) {
    throw new DataSourceError('Could not find LSOA code column in IMD CSV', {
      source: 'imd',
      path,
      column: 'LSOA Code',
    });
  }

  const rankColumn = findColumn(table.headers, IMD_RANK_CANDIDATES);
  const domainColumn = (domain: DeprivationDomain): string | undefined =>
    findColumn(table.headers, DOMAIN_DECILE_CANDIDATES[domain]);
  const columns = {
    income: domainColumn('income'),
    employment: domainColumn('employment'),
    education: domainColumn('education'),
    health: domainColumn('health'),
    crime: domainColumn('crime'),
    barriers: domainColumn('barriers'),
    livingEnvironment: domainColumn('livingEnvironment'),
  };

  const records = new Map<string, DeprivationRecord>();
  for (const row of table.rows) {
    const areaCode = (row[codeColumn] ?? '').trim();
    if (areaCode === '' || records.has(areaCode)) {
      continue;
    }

    const cell = (column: string | undefined): number | null =>
      column === undefined ? null : parseNumericCell(row[column]);

    records.set(areaCode, {
      areaCode,
      imdRank: cell(rankColumn),
      imdDecile: cell(decileColumn),
      domainDeciles: {
        income: cell(columns.income),
        employment: cell(columns.employment),
        education: cell(columns.education),
        health: cell(columns.health),
        crime: cell(columns.crime),
        barriers: cell(columns.barriers),
        livingEnvironment: cell(columns.livingEnvironment),
      },
    });
  }
  return records;
}

/**
 * @throws {DataSourceError} If the file is missing, unreadable or lacks a required column
 */
export function loadImdTable(path: string): Map<string, DeprivationRecord> {
  return parseImdTable(readCsvFile(path, 'imd'), path);
}
