/**
 * CLI Output Formatting Tests
 *
 * KEY TEST CASES:
 * - Table widths follow the widest cell; right alignment pads on the left
 * - Cells wider than a fixed width are truncated with "~"
 * - CSV quotes commas, quotes and newlines
 * - The global --json flag overrides any per-command format
 */

import { describe, test, expect } from 'vitest';
import {
  formatCsv,
  formatOutput,
  formatTable,
  formatters,
  parseOutputFormat,
  resolveFormat,
  type TableColumn,
} from '../../../cli/lib/output.js';

const COLUMNS: readonly TableColumn[] = [
  { key: 'name', header: 'Ward' },
  { key: 'count', header: 'Count', align: 'right' },
];

const ROWS = [
  { name: 'Brockley', count: 3 },
  { name: 'Deptford', count: 12 },
];

describe('formatTable', () => {
  test('aligns columns to the widest value', () => {
    expect(formatTable(ROWS, COLUMNS).split('\n')).toEqual([
      'Ward     | Count',
      '---------+------',
      'Brockley |     3',
      'Deptford |    12',
    ]);
  });

  test('truncates cells wider than a fixed width', () => {
    const output = formatTable([{ area: 'Southwark' }], [{ key: 'area', header: 'Area', width: 5 }]);

    expect(output.split('\n')).toEqual(['Area ', '-----', 'Sout~']);
  });

  test('reports an empty result', () => {
    expect(formatTable([], COLUMNS)).toBe('No entries found.');
  });

  test('applies column formatters', () => {
    const output = formatTable([{ share: 12.34 }, { share: null }], [
      { key: 'share', header: 'Share', align: 'right', formatter: formatters.percent },
    ]);

    expect(output.split('\n').slice(2)).toEqual(['12.3%', '    -']);
  });
});

describe('formatCsv', () => {
  test('writes a header and quotes special characters', () => {
    const output = formatCsv([{ a: 'x, y', b: 'say "hi"' }], [
      { key: 'a', header: 'A' },
      { key: 'b', header: 'B' },
    ]);

    expect(output).toBe('A,B\n"x, y","say ""hi"""');
  });

  test('writes only the header for no rows', () => {
    expect(formatCsv([], COLUMNS)).toBe('Ward,Count');
  });
});

describe('formatOutput', () => {
  test('serialises rows as JSON', () => {
    expect(JSON.parse(formatOutput(ROWS, 'json', COLUMNS))).toEqual(ROWS);
  });
});

describe('formatters', () => {
  test('count uses thousands separators', () => {
    expect(formatters.count(12345.6)).toBe('12,346');
    expect(formatters.count(undefined)).toBe('-');
  });

  test('decimal keeps one place', () => {
    expect(formatters.decimal(120)).toBe('120.0');
    expect(formatters.decimal('120')).toBe('-');
  });
});

describe('format selection', () => {
  test('defaults to table', () => {
    expect(resolveFormat(undefined, false)).toBe('table');
  });

  test('--json wins over the command format', () => {
    expect(resolveFormat('csv', true)).toBe('json');
  });

  test('rejects unknown formats', () => {
    expect(() => parseOutputFormat('xml')).toThrow('Invalid format: xml. Must be one of: table, json, csv');
    expect(() => resolveFormat('xml', false)).toThrow(Error);
  });
});
