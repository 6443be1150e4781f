/**
 * Value normalizers and their dispatch table
 *
 * @module normalizers
 */

export { normalizeStreet, extractStreetType } from './street.js';
export { normalizePhone } from './phone.js';
export { normalizePostcode } from './postcode.js';
export { normalizeCounty } from './county.js';
export { normalizePharmacyName } from './pharmacy.js';
export {
  NormalizerRegistry,
  createNormalizerRules,
  buildTagLookup,
  defaultNormalizerRegistry,
  type NormalizerRule,
  type TagLookup,
  type ValueNormalizer,
} from './registry.js';
export {
  DEFAULT_RULES,
  DEFAULT_RULES_PATH,
  NormalizationRulesSchema,
  loadNormalizationRules,
  parseNormalizationRules,
  type NormalizationRules,
  type StreetRules,
  type StreetAbbreviation,
  type PhoneRules,
  type PostcodeRules,
  type PharmacyRules,
} from './rules.js';
