/**
 * Postal code normalization
 *
 * @module normalizers/postcode
 */

import { DEFAULT_RULES, type PostcodeRules } from './rules.js';

/**
 * Force a postal code to exactly `length` characters.
 *
 * Known malformed literals map to their corrected code. Longer values keep
 * their leading characters (`20011-1234` → `20011`); shorter ones are
 * left-padded (`2134` → `02134`), the usual shape of a ZIP code that lost its
 * leading zero to a numeric column. Empty input stays empty.
 */
export function normalizePostcode(value: string, rules: PostcodeRules = DEFAULT_RULES.postcode): string {
  const corrected = Object.hasOwn(rules.corrections, value) ? rules.corrections[value] : undefined;
  if (corrected !== undefined) {
    return corrected;
  }
  if (value.length === 0 || value.length === rules.length) {
    return value;
  }
  if (value.length > rules.length) {
    return value.slice(0, rules.length);
  }
  return value.padStart(rules.length, rules.padCharacter);
}
