/**
 * Output formatting for CLI commands
 *
 * @module cli/lib/output
 */

export type OutputFormat = 'table' | 'json' | 'ndjson';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['table', 'json', 'ndjson'];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Column definition for table output
 */
export interface TableColumn {
  readonly key: string;
  readonly header: string;
  readonly width?: number;
  readonly align?: 'left' | 'right';
  readonly formatter?: (value: unknown) => string;
}

function cellText(row: Readonly<Record<string, unknown>>, column: TableColumn): string {
  const value = row[column.key];
  if (column.formatter) {
    return column.formatter(value);
  }
  if (value === null || value === undefined) {
    return '';
  }
  return typeof value === 'object' ? JSON.stringify(value) : String(value);
}

export function formatTable(
  data: readonly Readonly<Record<string, unknown>>[],
  columns: readonly TableColumn[]
): string {
  if (data.length === 0) {
    return 'No entries found.';
  }

  const widths = columns.map(
    (col) =>
      col.width ?? Math.max(col.header.length, ...data.map((row) => cellText(row, col).length))
  );

  const render = (cells: readonly string[]): string =>
    cells
      .map((cell, i) => {
        const column = columns[i];
        return padCell(cell, widths[i] ?? cell.length, column?.align ?? 'left');
      })
      .join(' | ');

  const headerRow = render(columns.map((col) => col.header));
  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');
  const dataRows = data.map((row) => render(columns.map((col) => cellText(row, col))));

  return [headerRow, separator, ...dataRows].join('\n');
}

function padCell(value: string, width: number, align: 'left' | 'right'): string {
  const truncated = value.length > width ? value.slice(0, width - 1) + '~' : value;
  return align === 'right' ? truncated.padStart(width) : truncated.padEnd(width);
}

export function formatJson(data: unknown, pretty = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

export function formatNdjson(data: readonly unknown[]): string {
  return data.map((item) => JSON.stringify(item)).join('\n');
}

export function formatOutput(
  data: readonly Readonly<Record<string, unknown>>[],
  format: OutputFormat,
  columns: readonly TableColumn[]
): string {
  switch (format) {
    case 'json':
      return formatJson(data);
    case 'ndjson':
      return formatNdjson(data);
    case 'table':
      return formatTable(data, columns);
  }
}

export const formatters = {
  truncate:
    (maxLength: number) =>
    (value: unknown): string => {
      const str = value === null || value === undefined ? '' : String(value);
      return str.length > maxLength ? str.slice(0, maxLength - 3) + '...' : str;
    },

  dash: (value: unknown): string =>
    value === null || value === undefined || value === '' ? '-' : String(value),
};

export function printOutput(output: string): void {
  console.log(output);
}

export function printError(message: string): void {
  console.error(`Error: ${message}`);
}

export function printSuccess(message: string): void {
  console.log(`Success: ${message}`);
}

export function printWarning(message: string): void {
  console.warn(`Warning: ${message}`);
}
