/**
 * Output Formatting for CLI Commands
 *
 * Consistent output across commands in table, json or csv form.
 *
 * @module cli/lib/output
 */

export type OutputFormat = 'table' | 'json' | 'csv';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['table', 'json', 'csv'];

export type Row = Readonly<Record<string, unknown>>;

/**
 * Column definition for table and csv output
 */
export interface TableColumn {
  readonly key: string;
  readonly header: string;
  readonly width?: number;
  readonly align?: 'left' | 'right';
  readonly formatter?: (value: unknown) => string;
}

function renderCell(row: Row, column: TableColumn): string {
  const value = row[column.key];
  return column.formatter ? column.formatter(value) : String(value ?? '');
}

/**
 * Format rows as an aligned text table
 */
export function formatTable(data: readonly Row[], columns: readonly TableColumn[]): string {
  if (data.length === 0) {
    return 'No entries found.';
  }

  const widths = columns.map((col) => {
    if (col.width) return col.width;
    const maxDataWidth = Math.max(...data.map((row) => renderCell(row, col).length));
    return Math.max(col.header.length, maxDataWidth);
  });

  const headerRow = columns
    .map((col, i) => padCell(col.header, widths[i], col.align ?? 'left'))
    .join(' | ');

  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');

  const dataRows = data.map((row) =>
    columns.map((col, i) => padCell(renderCell(row, col), widths[i], col.align ?? 'left')).join(' | ')
  );

  return [headerRow, separator, ...dataRows].join('\n');
}

function padCell(value: string, width: number, align: 'left' | 'right'): string {
  const truncated = value.length > width ? value.slice(0, width - 1) + '~' : value;
  return align === 'right' ? truncated.padStart(width) : truncated.padEnd(width);
}

export function formatJson<T>(data: T, pretty = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

/**
 * Format rows as CSV with a header line
 */
export function formatCsv(data: readonly Row[], columns: readonly TableColumn[]): string {
  const headerRow = columns.map((c) => escapeCsv(c.header)).join(',');
  const dataRows = data.map((row) => columns.map((col) => escapeCsv(renderCell(row, col))).join(','));
  return [headerRow, ...dataRows].join('\n');
}

function escapeCsv(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatOutput(
  data: readonly Row[],
  format: OutputFormat,
  columns: readonly TableColumn[]
): string {
  switch (format) {
    case 'json':
      return formatJson(data);
    case 'csv':
      return formatCsv(data, columns);
    case 'table':
      return formatTable(data, columns);
  }
}

/**
 * @throws {Error} If the value is not a known format
 */
export function parseOutputFormat(value: string): OutputFormat {
  const format = OUTPUT_FORMATS.find((f) => f === value);
  if (format === undefined) {
    throw new Error(`Invalid format: ${value}. Must be one of: ${OUTPUT_FORMATS.join(', ')}`);
  }
  return format;
}

/**
 * Common column formatters
 */
export const formatters = {
  /**
   * Percentage with one decimal; missing values as "-"
   */
  percent: (value: unknown): string => {
    if (typeof value !== 'number') return '-';
    return `${value.toFixed(1)}%`;
  },

  /**
   * Integer with thousands separators
   */
  count: (value: unknown): string => {
    if (typeof value !== 'number') return '-';
    return Math.round(value).toLocaleString('en-GB');
  },

  decimal: (value: unknown): string => {
    if (typeof value !== 'number') return '-';
    return value.toFixed(1);
  },
};

export function printOutput(output: string): void {
  console.log(output);
}

export function printError(message: string): void {
  console.error(`Error: ${message}`);
}

export function printWarning(message: string): void {
  console.warn(`Warning: ${message}`);
}

/**
 * Command format flag, forced to json by the global --json option
 */
export function resolveFormat(format: string | undefined, json: boolean): OutputFormat {
  if (json) return 'json';
  return format === undefined ? 'table' : parseOutputFormat(format);
}
