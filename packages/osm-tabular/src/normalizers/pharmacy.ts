/**
 * Pharmacy name cleanup
 *
 * @module normalizers/pharmacy
 */

import { DEFAULT_RULES, type PharmacyRules } from './rules.js';

/**
 * Remove separators, spaces and the word "Pharmacy"/"pharmacy" from a name,
 * so `"CVS/pharmacy"` and `"CVS Pharmacy"` both become `"CVS"`.
 * Matching is case-sensitive.
 */
export function normalizePharmacyName(value: string, rules: PharmacyRules = DEFAULT_RULES.pharmacy): string {
  let name = value;
  for (const fragment of rules.remove) {
    name = name.replaceAll(fragment, '');
  }
  return name;
}
