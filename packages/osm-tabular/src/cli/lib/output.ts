/**
 * CLI Output Formatting
 *
 * @module cli/lib/output
 */

export interface TableColumn<T> {
  readonly key: keyof T & string;
  readonly header: string;
  readonly align?: 'left' | 'right';
}

function cellText(value: unknown): string {
  return value === undefined || value === null ? '' : String(value);
}

function padCell(value: string, width: number, align: 'left' | 'right'): string {
  return align === 'right' ? value.padStart(width) : value.padEnd(width);
}

/**
 * Format rows as an aligned text table
 */
export function formatTable<T extends object>(data: readonly T[], columns: readonly TableColumn<T>[]): string {
  if (data.length === 0) {
    return 'No entries found.';
  }

  const widths = columns.map((col) =>
    Math.max(col.header.length, ...data.map((row) => cellText(row[col.key]).length))
  );
  const widthAt = (i: number): number => widths[i] ?? 0;

  const headerRow = columns.map((col, i) => padCell(col.header, widthAt(i), col.align ?? 'left')).join(' | ');
  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');
  const dataRows = data.map((row) =>
    columns.map((col, i) => padCell(cellText(row[col.key]), widthAt(i), col.align ?? 'left')).join(' | ')
  );

  return [headerRow, separator, ...dataRows].join('\n');
}

export function formatJson<T>(data: T, pretty = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

/**
 * Write command output to stdout
 */
export function printOutput(output: string): void {
  console.log(output);
}
