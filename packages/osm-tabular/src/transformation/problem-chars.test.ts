import { describe, it, expect } from 'vitest';
import { hasProblemChars } from './problem-chars.js';

describe('hasProblemChars', () => {
  it('accepts plain and namespaced keys', () => {
    expect(hasProblemChars('highway')).toBe(false);
    expect(hasProblemChars('addr:street')).toBe(false);
    expect(hasProblemChars('name_1')).toBe(false);
  });

  it.each([
    'fix me',
    'a=b',
    'a+b',
    'name.en',
    'x/y',
    'k&v',
    '<b>',
    'a>b',
    'tag;2',
    "it's",
    'it"s',
    'odd?',
    '50%',
    '#1',
    'cost$',
    'user@host',
    'a,b',
    'tab\tkey',
    'carriage\rreturn',
    'line\nbreak',
  ])(
    'rejects %j',
    (key) => {
      expect(hasProblemChars(key)).toBe(true);
    }
  );
});
