import { describe, it, expect } from 'vitest';
import { buildTagLookup, createNormalizerRules, defaultNormalizerRegistry, NormalizerRegistry } from './registry.js';
import { DEFAULT_RULES } from './rules.js';

const pharmacy = buildTagLookup([
  { key: 'amenity', value: 'pharmacy' },
  { key: 'name', value: 'CVS/pharmacy' },
]);
const none = buildTagLookup([]);

describe('buildTagLookup', () => {
  it('keeps the last value of a repeated key', () => {
    const lookup = buildTagLookup([
      { key: 'amenity', value: 'cafe' },
      { key: 'amenity', value: 'pharmacy' },
    ]);
    expect(lookup.get('amenity')).toBe('pharmacy');
  });
});

describe('NormalizerRegistry', () => {
  const registry = defaultNormalizerRegistry;

  it('normalizes pharmacy names only on pharmacy nodes', () => {
    expect(registry.apply('node', { type: 'regular', key: 'name' }, 'CVS/pharmacy', pharmacy)).toBe('CVS');
    expect(registry.apply('node', { type: 'regular', key: 'name' }, 'CVS/pharmacy', none)).toBe('CVS/pharmacy');
  });

  it('normalizes the three phone keys on nodes', () => {
    expect(registry.apply('node', { type: 'regular', key: 'phone' }, '(202) 555-0142', none)).toBe('2025550142');
    expect(registry.apply('node', { type: 'contact', key: 'phone' }, '(202) 555-0142', none)).toBe('2025550142');
    expect(registry.apply('node', { type: 'phone', key: 'pharmacy' }, '(202) 555-0142', none)).toBe('2025550142');
  });

  it('normalizes postcodes on nodes but not on ways', () => {
    expect(registry.apply('node', { type: 'addr', key: 'postcode' }, '2011', none)).toBe('20011');
    expect(registry.apply('way', { type: 'addr', key: 'postcode' }, '2011', none)).toBe('2011');
  });

  it('normalizes streets and counties on ways but not on nodes', () => {
    expect(registry.apply('way', { type: 'addr', key: 'street' }, 'Benning Rd', none)).toBe('Benning Road');
    expect(registry.apply('node', { type: 'addr', key: 'street' }, 'Benning Rd', none)).toBe('Benning Rd');
    expect(registry.apply('way', { type: 'tiger', key: 'county' }, 'Cook, IL', none)).toBe('Cook');
    expect(registry.apply('node', { type: 'tiger', key: 'county' }, 'Cook, IL', none)).toBe('Cook, IL');
  });

  it('returns other values unchanged', () => {
    expect(registry.apply('node', { type: 'regular', key: 'amenity' }, 'pharmacy', pharmacy)).toBe('pharmacy');
    expect(registry.find('node', { type: 'regular', key: 'amenity' }, pharmacy)).toBeUndefined();
  });

  it('names the rule it found', () => {
    expect(registry.find('node', { type: 'contact', key: 'phone' }, none)?.name).toBe('contact-phone');
  });

  it('binds rules to the tables it was built from', () => {
    const custom = new NormalizerRegistry(
      createNormalizerRules({
        ...DEFAULT_RULES,
        street: { ...DEFAULT_RULES.street, abbreviations: [['Hwy', 'Highway']] },
      })
    );
    expect(custom.apply('way', { type: 'addr', key: 'street' }, 'Ocean Hwy', none)).toBe('Ocean Highway');
    expect(custom.apply('way', { type: 'addr', key: 'street' }, 'Benning Rd', none)).toBe('Benning Rd');
  });

  it('falls through to the next rule when a condition fails', () => {
    const conditional = new NormalizerRegistry([
      { name: 'upper', kinds: ['node'], type: 'regular', key: 'ref', normalize: (v) => v.toUpperCase(), when: (t) => t.has('x') },
      { name: 'trim', kinds: ['node'], type: 'regular', key: 'ref', normalize: (v) => v.trim() },
    ]);
    expect(conditional.apply('node', { type: 'regular', key: 'ref' }, ' a ', none)).toBe('a');
    expect(conditional.apply('node', { type: 'regular', key: 'ref' }, ' a ', buildTagLookup([{ key: 'x', value: '' }]))).toBe(' A ');
  });
});
