/**
 * Audit Module
 *
 * @module audit
 */

export {
  AUDIT_CATEGORIES,
  PHONE_KEYS,
  StreetTypeReporter,
  ValueReporter,
  auditCounties,
  auditPharmacyNames,
  auditPhones,
  auditPostcodes,
  auditStreetTypes,
  countyReporter,
  pharmacyNameReporter,
  phoneReporter,
  postcodeReporter,
  type AuditCategory,
  type AuditFindings,
  type AuditReporter,
  type StreetTypeFindings,
} from './reporters.js';
export { formatAuditReport, runAudit, type AuditReport, type RunAuditOptions } from './report.js';
