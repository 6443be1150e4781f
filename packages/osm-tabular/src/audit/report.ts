/**
 * Combined audit run and its text rendering
 *
 * @module audit/report
 */

import type { RawElement } from '../core/types.js';
import {
  AUDIT_CATEGORIES,
  StreetTypeReporter,
  countyReporter,
  pharmacyNameReporter,
  phoneReporter,
  postcodeReporter,
  type AuditCategory,
  type AuditFindings,
  type AuditReporter,
  type StreetTypeFindings,
} from './reporters.js';

/**
 * Findings for the categories that were run
 */
export type AuditReport = { readonly [C in AuditCategory]?: AuditFindings[C] };

export interface RunAuditOptions {
  readonly expectedStreetTypes?: readonly string[];
}

type ReporterSet = { [C in AuditCategory]?: AuditReporter<AuditFindings[C]> };

function createReporters(categories: readonly AuditCategory[], options: RunAuditOptions): ReporterSet {
  const chosen = new Set(categories);
  return {
    ...(chosen.has('street') && { street: new StreetTypeReporter(options.expectedStreetTypes) }),
    ...(chosen.has('pharmacy') && { pharmacy: pharmacyNameReporter() }),
    ...(chosen.has('county') && { county: countyReporter() }),
    ...(chosen.has('phone') && { phone: phoneReporter() }),
    ...(chosen.has('postcode') && { postcode: postcodeReporter() }),
  };
}

/**
 * Run the chosen reporters over one pass of `elements`
 */
export async function runAudit(
  elements: AsyncIterable<RawElement> | Iterable<RawElement>,
  categories: readonly AuditCategory[] = AUDIT_CATEGORIES,
  options: RunAuditOptions = {}
): Promise<AuditReport> {
  const reporters = createReporters(categories, options);
  const active: Pick<AuditReporter<unknown>, 'observe'>[] = [];
  for (const reporter of Object.values(reporters)) {
    if (reporter) active.push(reporter);
  }

  for await (const element of elements) {
    for (const reporter of active) {
      reporter.observe(element);
    }
  }

  return {
    ...(reporters.street && { street: reporters.street.result() }),
    ...(reporters.pharmacy && { pharmacy: reporters.pharmacy.result() }),
    ...(reporters.county && { county: reporters.county.result() }),
    ...(reporters.phone && { phone: reporters.phone.result() }),
    ...(reporters.postcode && { postcode: reporters.postcode.result() }),
  };
}

// ============================================================================
// Text rendering
// ============================================================================

const VALUE_TITLES: Record<Exclude<AuditCategory, 'street'>, string> = {
  pharmacy: 'Pharmacy names',
  county: 'Counties',
  phone: 'Phone numbers',
  postcode: 'Postcodes',
};

function formatStreetSection(findings: StreetTypeFindings): string[] {
  const types = Object.keys(findings);
  const lines = [`Unexpected street types: ${types.length}`];
  for (const streetType of types) {
    lines.push(`  ${streetType}: ${(findings[streetType] ?? []).join(', ')}`);
  }
  return lines;
}

/**
 * Distinct values in first-seen order, each with its occurrence count
 */
function formatValueSection(title: string, values: readonly string[]): string[] {
  const counts = new Map<string, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  const lines = [`${title}: ${values.length} values, ${counts.size} distinct`];
  for (const [value, count] of counts) {
    lines.push(`  ${value} (${count})`);
  }
  return lines;
}

/**
 * Human-readable dump, one section per category present, blank line between
 */
export function formatAuditReport(report: AuditReport): string {
  const sections: string[][] = [];

  for (const category of AUDIT_CATEGORIES) {
    if (category === 'street') {
      if (report.street) sections.push(formatStreetSection(report.street));
      continue;
    }
    const values = report[category];
    if (values) sections.push(formatValueSection(VALUE_TITLES[category], values));
  }

  return sections.map((lines) => lines.join('\n')).join('\n\n');
}
