/**
 * Normalizer Dispatch
 *
 * Maps `(element kind, tag type, tag key)` to the normalizer that cleans the
 * tag's value. Rules are data: the shaper looks each tag up once and never
 * branches on key names itself.
 *
 * @module normalizers/registry
 */

import type { ShapeableKind } from '../core/types.js';
import type { ParsedTagKey } from '../transformation/tag-key.js';
import { normalizeCounty } from './county.js';
import { normalizePharmacyName } from './pharmacy.js';
import { normalizePhone } from './phone.js';
import { normalizePostcode } from './postcode.js';
import { DEFAULT_RULES, type NormalizationRules } from './rules.js';
import { normalizeStreet } from './street.js';

/**
 * Raw key → value of every tag on one element. Built before any of the
 * element's tags is shaped; later duplicates win.
 */
export type TagLookup = ReadonlyMap<string, string>;

export type ValueNormalizer = (value: string) => string;

export interface NormalizerRule {
  /** Short label used in logs and tests */
  readonly name: string;
  readonly kinds: readonly ShapeableKind[];
  readonly type: string;
  readonly key: string;
  readonly normalize: ValueNormalizer;
  /** Extra condition on the element's other tags */
  readonly when?: (tags: TagLookup) => boolean;
}

export function buildTagLookup(tags: readonly { readonly key: string; readonly value: string }[]): TagLookup {
  const lookup = new Map<string, string>();
  for (const tag of tags) {
    lookup.set(tag.key, tag.value);
  }
  return lookup;
}

const isPharmacy = (tags: TagLookup): boolean => tags.get('amenity') === 'pharmacy';

/**
 * Default rule set bound to a rules table
 */
export function createNormalizerRules(rules: NormalizationRules = DEFAULT_RULES): readonly NormalizerRule[] {
  const phone: ValueNormalizer = (value) => normalizePhone(value, rules.phone);

  return [
    {
      name: 'pharmacy-name',
      kinds: ['node'],
      type: 'regular',
      key: 'name',
      normalize: (value) => normalizePharmacyName(value, rules.pharmacy),
      when: isPharmacy,
    },
    { name: 'phone', kinds: ['node'], type: 'regular', key: 'phone', normalize: phone },
    { name: 'contact-phone', kinds: ['node'], type: 'contact', key: 'phone', normalize: phone },
    { name: 'pharmacy-phone', kinds: ['node'], type: 'phone', key: 'pharmacy', normalize: phone },
    {
      name: 'postcode',
      kinds: ['node'],
      type: 'addr',
      key: 'postcode',
      normalize: (value) => normalizePostcode(value, rules.postcode),
    },
    { name: 'county', kinds: ['way'], type: 'tiger', key: 'county', normalize: normalizeCounty },
    {
      name: 'street',
      kinds: ['way'],
      type: 'addr',
      key: 'street',
      normalize: (value) => normalizeStreet(value, rules.street.abbreviations),
    },
  ];
}

function indexKey(kind: ShapeableKind, type: string, key: string): string {
  return `${kind}\u0000${type}\u0000${key}`;
}

/**
 * Lookup table over a rule list
 */
export class NormalizerRegistry {
  private readonly index = new Map<string, NormalizerRule[]>();

  constructor(rules: readonly NormalizerRule[] = createNormalizerRules()) {
    for (const rule of rules) {
      for (const kind of rule.kinds) {
        const slot = indexKey(kind, rule.type, rule.key);
        const existing = this.index.get(slot);
        if (existing) {
          existing.push(rule);
        } else {
          this.index.set(slot, [rule]);
        }
      }
    }
  }

  /**
   * First rule for this tag whose condition holds, if any
   */
  find(kind: ShapeableKind, tagKey: ParsedTagKey, tags: TagLookup): NormalizerRule | undefined {
    const candidates = this.index.get(indexKey(kind, tagKey.type, tagKey.key));
    return candidates?.find((rule) => rule.when === undefined || rule.when(tags));
  }

  /**
   * Normalized value, or the raw value when no rule applies
   */
  apply(kind: ShapeableKind, tagKey: ParsedTagKey, value: string, tags: TagLookup): string {
    const rule = this.find(kind, tagKey, tags);
    return rule ? rule.normalize(value) : value;
  }
}

export const defaultNormalizerRegistry = new NormalizerRegistry();
