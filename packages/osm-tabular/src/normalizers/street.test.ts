import { describe, it, expect } from 'vitest';
import { extractStreetType, normalizeStreet } from './street.js';

describe('normalizeStreet', () => {
  it('expands a trailing suffix abbreviation', () => {
    expect(normalizeStreet('West Lexington St.')).toBe('West Lexington Street');
    expect(normalizeStreet('Benning Rd')).toBe('Benning Road');
    expect(normalizeStreet('Florida Ave')).toBe('Florida Avenue');
  });

  it('expands a leading direction', () => {
    expect(normalizeStreet('E Capitol')).toBe('East Capitol');
  });

  it('stops at the first entry whose expansion is already present', () => {
    // "Ave" becomes "Avenue", then the "Ave." entry sees "Avenue" and ends the scan
    expect(normalizeStreet('Connecticut Ave NW')).toBe('Connecticut Avenue NW');
    expect(normalizeStreet('N Capitol St')).toBe('N Capitol Street');
  });

  it('leaves a name that already contains an expansion untouched', () => {
    expect(normalizeStreet('Calvert Street')).toBe('Calvert Street');
    expect(normalizeStreet('Calvert Street NW')).toBe('Calvert Street NW');
  });

  it('matches whole words only', () => {
    expect(normalizeStreet('Stanton Rd')).toBe('Stanton Road');
    expect(normalizeStreet('Easton')).toBe('Easton');
  });

  it('keeps the original whitespace between words', () => {
    expect(normalizeStreet('Benning  Rd')).toBe('Benning  Road');
  });

  it('uses a custom table when given one', () => {
    expect(normalizeStreet('Ocean Hwy', [['Hwy', 'Highway']])).toBe('Ocean Highway');
  });

  it('is idempotent with the bundled rules', () => {
    for (const name of ['West Lexington St.', 'Connecticut Ave NW', 'E Capitol', 'Benning Rd', 'Park Pl']) {
      const once = normalizeStreet(name);
      expect(normalizeStreet(once)).toBe(once);
    }
  });

  it('returns an empty string unchanged', () => {
    expect(normalizeStreet('')).toBe('');
  });
});

describe('extractStreetType', () => {
  it('returns the last word', () => {
    expect(extractStreetType('Georgia Ave NW')).toBe('NW');
    expect(extractStreetType('West Lexington St.')).toBe('St.');
    expect(extractStreetType('Broadway')).toBe('Broadway');
  });

  it('returns null for blank input', () => {
    expect(extractStreetType('')).toBeNull();
    expect(extractStreetType('   ')).toBeNull();
  });
});
