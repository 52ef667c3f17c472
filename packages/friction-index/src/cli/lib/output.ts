/**
 * Output Formatting for CLI Commands
 *
 * Consistent rendering of result tables across commands.
 * Supports: table, json, ndjson, csv formats
 *
 * @module cli/lib/output
 */

/**
 * Output format options
 */
export type OutputFormat = 'table' | 'json' | 'ndjson' | 'csv';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['table', 'json', 'ndjson', 'csv'];

/**
 * Flat row handed to the formatters
 */
export type OutputRow = Readonly<Record<string, unknown>>;

/**
 * Column definition for table and CSV output
 */
export interface TableColumn {
  readonly key: string;
  readonly header: string;
  readonly align?: 'left' | 'right';
  readonly formatter?: (value: unknown) => string;
}

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

function renderCell(row: OutputRow, col: TableColumn): string {
  const value = row[col.key];
  return col.formatter ? col.formatter(value) : String(value ?? '');
}

/**
 * Format data as a table
 */
export function formatTable(data: readonly OutputRow[], columns: readonly TableColumn[]): string {
  if (data.length === 0) {
    return 'No entries found.';
  }

  const widths = columns.map((col) => {
    const maxDataWidth = Math.max(...data.map((row) => renderCell(row, col).length));
    return Math.max(col.header.length, maxDataWidth);
  });

  const headerRow = columns
    .map((col, i) => padCell(col.header, widths[i], col.align || 'left'))
    .join(' | ');

  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');

  const dataRows = data.map((row) =>
    columns.map((col, i) => padCell(renderCell(row, col), widths[i], col.align || 'left')).join(' | ')
  );

  return [headerRow, separator, ...dataRows].join('\n');
}

/**
 * Pad a cell value to its column width
 */
function padCell(value: string, width: number, align: 'left' | 'right'): string {
  return align === 'right' ? value.padStart(width) : value.padEnd(width);
}

export function formatJson<T>(data: T, pretty = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

export function formatNdjson<T>(data: readonly T[]): string {
  return data.map((item) => JSON.stringify(item)).join('\n');
}

/**
 * Format data as CSV
 */
export function formatCsv(data: readonly OutputRow[], columns: readonly TableColumn[]): string {
  const headerRow = columns.map((c) => escapeCSV(c.header)).join(',');
  if (data.length === 0) {
    return headerRow;
  }

  const dataRows = data.map((row) =>
    columns.map((col) => escapeCSV(renderCell(row, col))).join(',')
  );

  return [headerRow, ...dataRows].join('\n');
}

function escapeCSV(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Format data in the specified format
 */
export function formatOutput(
  data: readonly OutputRow[],
  format: OutputFormat,
  columns: readonly TableColumn[]
): string {
  switch (format) {
    case 'json':
      return formatJson(data);
    case 'ndjson':
      return formatNdjson(data);
    case 'csv':
      return formatCsv(data, columns);
    case 'table':
    default:
      return formatTable(data, columns);
  }
}

/**
 * Common column formatters
 */
export const formatters = {
  /**
   * Fixed decimal places
   */
  fixed:
    (digits: number) =>
    (value: unknown): string => {
      if (typeof value !== 'number') return '-';
      return value.toFixed(digits);
    },

  number: (value: unknown): string => {
    if (value === null || value === undefined) return '-';
    const num = Number(value);
    return isNaN(num) ? String(value) : num.toLocaleString('en-US');
  },
};

export function printOutput(output: string): void {
  console.log(output);
}
