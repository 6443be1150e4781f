/**
 * Audit Reporters
 *
 * Read-only passes over raw elements that collect the values the
 * normalizers are meant to clean, so the rule tables can be checked against
 * real data. Nothing here normalizes or mutates.
 *
 * Each reporter observes one element at a time; `runAudit` drives several
 * of them over a single pass of the input.
 *
 * @module audit/reporters
 */

import type { RawElement } from '../core/types.js';
import { buildTagLookup } from '../normalizers/registry.js';
import { DEFAULT_RULES } from '../normalizers/rules.js';
import { extractStreetType } from '../normalizers/street.js';

export type AuditCategory = 'street' | 'pharmacy' | 'county' | 'phone' | 'postcode';

export const AUDIT_CATEGORIES: readonly AuditCategory[] = ['street', 'pharmacy', 'county', 'phone', 'postcode'];

/**
 * Unexpected street suffix → sorted unique street names ending in it
 */
export type StreetTypeFindings = Readonly<Record<string, readonly string[]>>;

export interface AuditFindings {
  readonly street: StreetTypeFindings;
  readonly pharmacy: readonly string[];
  readonly county: readonly string[];
  readonly phone: readonly string[];
  readonly postcode: readonly string[];
}

export interface AuditReporter<T> {
  observe(element: RawElement): void;
  result(): T;
}

export const PHONE_KEYS = ['phone', 'contact:phone', 'phone:pharmacy'] as const;

type Elements = AsyncIterable<RawElement> | Iterable<RawElement>;

// ============================================================================
// Reporters
// ============================================================================

export class StreetTypeReporter implements AuditReporter<StreetTypeFindings> {
  private readonly expected: ReadonlySet<string>;
  private readonly found = new Map<string, Set<string>>();

  constructor(expectedTypes: readonly string[] = DEFAULT_RULES.street.expectedTypes) {
    this.expected = new Set(expectedTypes);
  }

  observe(element: RawElement): void {
    if (element.kind === 'relation') return;

    for (const tag of element.tags) {
      if (tag.key !== 'addr:street') continue;
      const streetType = extractStreetType(tag.value);
      if (streetType === null || this.expected.has(streetType)) continue;

      const names = this.found.get(streetType);
      if (names) {
        names.add(tag.value);
      } else {
        this.found.set(streetType, new Set([tag.value]));
      }
    }
  }

  result(): StreetTypeFindings {
    const findings: Record<string, readonly string[]> = {};
    for (const streetType of [...this.found.keys()].sort()) {
      findings[streetType] = [...(this.found.get(streetType) ?? [])].sort();
    }
    return findings;
  }
}

/**
 * Collects values in input order. `select` returns the values one element
 * contributes.
 */
export class ValueReporter implements AuditReporter<readonly string[]> {
  private readonly values: string[] = [];

  constructor(private readonly select: (element: RawElement) => readonly string[]) {}

  observe(element: RawElement): void {
    this.values.push(...this.select(element));
  }

  result(): readonly string[] {
    return [...this.values];
  }
}

function nodeTagValues(keys: readonly string[], when?: (tags: ReadonlyMap<string, string>) => boolean) {
  return (element: RawElement): readonly string[] => {
    if (element.kind !== 'node') return [];
    const tags = buildTagLookup(element.tags);
    if (when !== undefined && !when(tags)) return [];
    return keys.flatMap((key) => {
      const value = tags.get(key);
      return value === undefined ? [] : [value];
    });
  };
}

export const pharmacyNameReporter = (): ValueReporter =>
  new ValueReporter(nodeTagValues(['name'], (tags) => tags.get('amenity') === 'pharmacy'));

export const phoneReporter = (): ValueReporter => new ValueReporter(nodeTagValues(PHONE_KEYS));

export const postcodeReporter = (): ValueReporter => new ValueReporter(nodeTagValues(['addr:postcode']));

export const countyReporter = (): ValueReporter =>
  new ValueReporter((element) =>
    element.kind === 'way' ? element.tags.filter((tag) => tag.key === 'tiger:county').map((tag) => tag.value) : []
  );

// ============================================================================
// Single-category helpers
// ============================================================================

async function drive<T>(elements: Elements, reporter: AuditReporter<T>): Promise<T> {
  for await (const element of elements) {
    reporter.observe(element);
  }
  return reporter.result();
}

export function auditStreetTypes(
  elements: Elements,
  expectedTypes: readonly string[] = DEFAULT_RULES.street.expectedTypes
): Promise<StreetTypeFindings> {
  return drive(elements, new StreetTypeReporter(expectedTypes));
}

export function auditPharmacyNames(elements: Elements): Promise<readonly string[]> {
  return drive(elements, pharmacyNameReporter());
}

export function auditCounties(elements: Elements): Promise<readonly string[]> {
  return drive(elements, countyReporter());
}

export function auditPhones(elements: Elements): Promise<readonly string[]> {
  return drive(elements, phoneReporter());
}

export function auditPostcodes(elements: Elements): Promise<readonly string[]> {
  return drive(elements, postcodeReporter());
}
