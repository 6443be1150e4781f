/**
 * Test Fixture Factories
 *
 * Minimal valid raw elements, OSM XML builders and in-memory sinks.
 */

import { Writable } from 'node:stream';
import type { WriteError } from '../../core/errors.js';
import type { RawElement, RawTag, ShapedElement } from '../../core/types.js';
import type { RecordSink } from '../../persistence/sink.js';

// ============================================================================
// Raw Elements
// ============================================================================

export const NODE_ATTRIBUTES: Readonly<Record<string, string>> = {
  id: '1001',
  lat: '38.9',
  lon: '-77.03',
  user: 'mapper',
  uid: '42',
  version: '3',
  changeset: '555',
  timestamp: '2017-01-01T00:00:00Z',
};

export const WAY_ATTRIBUTES: Readonly<Record<string, string>> = {
  id: '2001',
  user: 'mapper',
  uid: '42',
  version: '1',
  changeset: '556',
  timestamp: '2017-01-02T00:00:00Z',
};

export function tags(entries: Readonly<Record<string, string>>): RawTag[] {
  return Object.entries(entries).map(([key, value]) => ({ key, value }));
}

export function createRawNode(
  tagEntries: Readonly<Record<string, string>> = {},
  attributes: Readonly<Record<string, string>> = {}
): RawElement {
  return {
    kind: 'node',
    attributes: { ...NODE_ATTRIBUTES, ...attributes },
    tags: tags(tagEntries),
    nodeRefs: [],
  };
}

export function createRawWay(
  refs: readonly string[] = [],
  tagEntries: Readonly<Record<string, string>> = {},
  attributes: Readonly<Record<string, string>> = {}
): RawElement {
  return {
    kind: 'way',
    attributes: { ...WAY_ATTRIBUTES, ...attributes },
    tags: tags(tagEntries),
    nodeRefs: refs.map((ref) => ({ ref })),
  };
}

/**
 * Copy of `attributes` without the named keys
 */
export function withoutAttributes(
  attributes: Readonly<Record<string, string>>,
  ...names: string[]
): Record<string, string> {
  return Object.fromEntries(Object.entries(attributes).filter(([name]) => !names.includes(name)));
}

// ============================================================================
// OSM XML
// ============================================================================

function attributeText(attributes: Readonly<Record<string, string>>): string {
  return Object.entries(attributes)
    .map(([name, value]) => ` ${name}="${value}"`)
    .join('');
}

export function nodeXml(
  attributes: Readonly<Record<string, string>>,
  tagEntries: Readonly<Record<string, string>> = {}
): string {
  const children = Object.entries(tagEntries).map(([k, v]) => `<tag k="${k}" v="${v}"/>`);
  return children.length === 0
    ? `<node${attributeText(attributes)}/>`
    : `<node${attributeText(attributes)}>${children.join('')}</node>`;
}

export function wayXml(
  attributes: Readonly<Record<string, string>>,
  refs: readonly string[],
  tagEntries: Readonly<Record<string, string>> = {}
): string {
  const nds = refs.map((ref) => `<nd ref="${ref}"/>`);
  const children = Object.entries(tagEntries).map(([k, v]) => `<tag k="${k}" v="${v}"/>`);
  return `<way${attributeText(attributes)}>${[...nds, ...children].join('')}</way>`;
}

export function osmDocument(...elements: string[]): string {
  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<osm version="0.6" generator="test">',
    '<bounds minlat="38.8" minlon="-77.1" maxlat="39.0" maxlon="-76.9"/>',
    ...elements,
    '</osm>',
  ].join('\n');
}

/**
 * Async iterable yielding `text` in pieces of `size` characters
 */
export async function* chunked(text: string, size: number): AsyncGenerator<string> {
  for (let i = 0; i < text.length; i += size) {
    yield text.slice(i, i + size);
  }
}

export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}

// ============================================================================
// Sinks
// ============================================================================

/**
 * Keeps every shaped element in memory
 */
export class MemorySink implements RecordSink {
  readonly written: ShapedElement[] = [];
  closed = false;

  async write(shaped: ShapedElement): Promise<readonly WriteError[]> {
    this.written.push(shaped);
    return [];
  }

  async flush(): Promise<readonly WriteError[]> {
    return [];
  }

  async close(): Promise<readonly WriteError[]> {
    this.closed = true;
    return [];
  }
}

/**
 * Writable that accumulates everything written to it as text
 */
export class MemoryWritable extends Writable {
  private readonly chunks: string[] = [];

  override _write(chunk: unknown, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.chunks.push(typeof chunk === 'string' ? chunk : String(chunk));
    callback();
  }

  get text(): string {
    return this.chunks.join('');
  }
}
