import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigError } from '../core/errors.js';
import { DEFAULT_RULES, loadNormalizationRules, parseNormalizationRules } from './rules.js';

function rulesWith(abbreviations: [string, string][]): unknown {
  return {
    ...DEFAULT_RULES,
    street: { ...DEFAULT_RULES.street, abbreviations },
  };
}

describe('bundled normalization rules', () => {
  it('load and validate', () => {
    expect(DEFAULT_RULES.version).toBe(1);
    expect(DEFAULT_RULES.street.expectedTypes).toContain('Street');
    expect(DEFAULT_RULES.phone.maxLength).toBe(10);
    expect(DEFAULT_RULES.postcode.length).toBe(5);
  });

  it('map N to North and NW to Northwest', () => {
    const table = new Map(DEFAULT_RULES.street.abbreviations);
    expect(table.get('N')).toBe('North');
    expect(table.get('NW')).toBe('Northwest');
  });
});

describe('parseNormalizationRules', () => {
  it('rejects an expansion that is also an abbreviation', () => {
    expect(() => parseNormalizationRules(rulesWith([['St', 'Street'], ['Street', 'Str']]))).toThrow(
      'Invalid normalization rules: street.abbreviations.0.1: expansion "Street" is also listed as an abbreviation (inline rules)'
    );
  });

  it('rejects multi-word abbreviations', () => {
    expect(() => parseNormalizationRules(rulesWith([['Mt Vernon', 'Mount Vernon']]))).toThrow(ConfigError);
  });

  it('rejects an unknown version', () => {
    expect(() => parseNormalizationRules({ ...DEFAULT_RULES, version: 2 })).toThrow(ConfigError);
  });
});

describe('loadNormalizationRules', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'osm-rules-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reads YAML files', () => {
    const path = join(dir, 'rules.yaml');
    writeFileSync(
      path,
      [
        'version: 1',
        'street:',
        '  abbreviations:',
        '    - [Hwy, Highway]',
        '  expectedTypes: [Highway]',
        'phone:',
        '  corrections: {}',
        '  prefixLabels: []',
        '  strip: ["-"]',
        '  maxLength: 7',
        'postcode:',
        '  corrections: {}',
        '  length: 5',
        '  padCharacter: "0"',
        'pharmacy:',
        '  remove: []',
      ].join('\n')
    );

    const rules = loadNormalizationRules(path);
    expect(rules.street.abbreviations).toEqual([['Hwy', 'Highway']]);
    expect(rules.phone.maxLength).toBe(7);
  });

  it('reports a missing file as a ConfigError', () => {
    expect(() => loadNormalizationRules(join(dir, 'missing.json'))).toThrow(ConfigError);
  });

  it('reports malformed JSON as a ConfigError', () => {
    const path = join(dir, 'rules.json');
    writeFileSync(path, '{ "version": 1,');
    expect(() => loadNormalizationRules(path)).toThrow(/Cannot parse normalization rules/);
  });
});
