/**
 * Phone number digit-stripping
 *
 * @module normalizers/phone
 */

import { DEFAULT_RULES, type PhoneRules } from './rules.js';

/**
 * Reduce a phone value to at most `maxLength` characters, normally the ten
 * digits of a North American number.
 *
 * Known malformed literals are swapped for their corrected number first.
 * Prefix labels (`tel:`) are removed before separators so a label followed by
 * a space still matches.
 */
export function normalizePhone(value: string, rules: PhoneRules = DEFAULT_RULES.phone): string {
  const corrected = Object.hasOwn(rules.corrections, value) ? rules.corrections[value] : undefined;
  let phone = corrected ?? value;

  for (const label of rules.prefixLabels) {
    phone = phone.replaceAll(label, '');
  }
  for (const fragment of rules.strip) {
    phone = phone.replaceAll(fragment, '');
  }

  return phone.length > rules.maxLength ? phone.slice(0, rules.maxLength) : phone;
}
