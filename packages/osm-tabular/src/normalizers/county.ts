/**
 * TIGER county name cleanup
 *
 * @module normalizers/county
 */

/**
 * Drop the trailing state from a single county (`"Cook, IL"` → `"Cook"`).
 *
 * Values listing several counties (`:` or `;` separated) pass through.
 */
export function normalizeCounty(value: string): string {
  if (value.includes(':') || value.includes(';')) {
    return value;
  }
  const comma = value.indexOf(',');
  return comma === -1 ? value : value.slice(0, comma);
}
