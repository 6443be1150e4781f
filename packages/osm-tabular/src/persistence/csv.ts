/**
 * CSV row formatting
 *
 * @module persistence/csv
 */

/**
 * Escape a value for CSV output
 */
export function escapeCSV(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n') || value.includes('\r')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function formatCell(value: string | number): string {
  return escapeCSV(typeof value === 'number' ? String(value) : value);
}

/**
 * One CSV line (with trailing newline) for `record`, columns in `fields` order
 */
export function formatCsvRow<T extends object, K extends keyof T>(
  record: T,
  fields: readonly K[]
): string {
  const cells = fields.map((field) => {
    const value = record[field];
    return typeof value === 'number' || typeof value === 'string' ? formatCell(value) : '';
  });
  return `${cells.join(',')}\n`;
}

/**
 * Header line for `fields`
 */
export function formatCsvHeader(fields: readonly string[]): string {
  return `${fields.map(escapeCSV).join(',')}\n`;
}
