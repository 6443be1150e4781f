/**
 * Characters that make a tag key unsafe as a tabular value.
 *
 * @module transformation/problem-chars
 */

export const PROBLEM_CHARS = /[=+/&<>;'"?%#$@,. \t\r\n]/;

/**
 * True when the key contains any problem character. Applied to keys only,
 * never to values.
 */
export function hasProblemChars(key: string): boolean {
  return PROBLEM_CHARS.test(key);
}
