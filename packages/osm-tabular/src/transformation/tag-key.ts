/**
 * Tag key namespace splitting.
 *
 * `addr:street` → `{ type: 'addr', key: 'street' }`
 * `addr:street:name` → `{ type: 'addr', key: 'street:name' }`
 * `building` → `{ type: 'regular', key: 'building' }`
 *
 * @module transformation/tag-key
 */

export const DEFAULT_TAG_TYPE = 'regular';

export interface ParsedTagKey {
  readonly type: string;
  readonly key: string;
}

/**
 * Split a raw tag key on its first colon. Later colons stay in `key`.
 */
export function parseTagKey(rawKey: string, defaultType: string = DEFAULT_TAG_TYPE): ParsedTagKey {
  const colon = rawKey.indexOf(':');
  if (colon === -1) {
    return { type: defaultType, key: rawKey };
  }
  return {
    type: rawKey.slice(0, colon),
    key: rawKey.slice(colon + 1),
  };
}
