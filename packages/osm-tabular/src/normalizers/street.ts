/**
 * Street name suffix and direction expansion
 *
 * @module normalizers/street
 */

import { DEFAULT_RULES, type StreetAbbreviation } from './rules.js';

/**
 * Expand abbreviated words in a street name.
 *
 * Walks the abbreviation table in order. If an entry's expansion is already a
 * word of the name the name is returned as it stands; otherwise every word
 * equal to the entry's abbreviation is replaced and the scan continues on the
 * updated name. Words are compared whole, so `St` never matches inside
 * `Stanton`, and whitespace between words is preserved.
 */
export function normalizeStreet(
  name: string,
  abbreviations: readonly StreetAbbreviation[] = DEFAULT_RULES.street.abbreviations
): string {
  // Odd indices hold the whitespace runs between words
  let parts = name.split(/(\s+)/);

  for (const [abbreviation, expansion] of abbreviations) {
    if (parts.includes(expansion)) {
      return parts.join('');
    }
    if (parts.includes(abbreviation)) {
      parts = parts.map((part) => (part === abbreviation ? expansion : part));
    }
  }

  return parts.join('');
}

const STREET_TYPE = /\S+\.?$/;

/**
 * Last word of a street name (`"Georgia Ave NW"` → `"NW"`), or null for blank input
 */
export function extractStreetType(name: string): string | null {
  const match = STREET_TYPE.exec(name);
  return match ? match[0] : null;
}
