/**
 * OSM XML Element Reader
 *
 * Streams an `.osm` document and yields one RawElement per top-level node,
 * way or relation, in document order. Each element's source text is cut out
 * by the fragment scanner and parsed with fast-xml-parser, so memory stays
 * bounded by one element plus one read chunk.
 *
 * @module ingestion/osm-reader
 */

import { createReadStream } from 'node:fs';
import { XMLParser } from 'fast-xml-parser';
import { OsmParseError } from '../core/errors.js';
import type { ElementKind, RawElement, RawNodeRef, RawTag } from '../core/types.js';
import { ElementFragmentScanner, type ElementFragment } from './fragment-scanner.js';

export type OsmInput = string | AsyncIterable<string | Uint8Array>;

export interface ReadOsmOptions {
  /** Element kinds to yield; others are skipped unparsed. Default: all three. */
  readonly kinds?: readonly ElementKind[];
}

const ATTRIBUTE_PREFIX = '@_';

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  parseAttributeValue: false,
  parseTagValue: false,
  trimValues: false,
  processEntities: true,
  htmlEntities: true,
  isArray: (name) => name === 'tag' || name === 'nd' || name === 'member',
});

/**
 * Yield parsed elements from a file path or a stream of chunks
 */
export async function* readOsmElements(
  input: OsmInput,
  options: ReadOsmOptions = {}
): AsyncGenerator<RawElement> {
  const kinds = new Set<ElementKind>(options.kinds ?? ['node', 'way', 'relation']);
  const source: AsyncIterable<string | Uint8Array> = typeof input === 'string' ? createReadStream(input) : input;
  const decoder = new TextDecoder('utf-8');
  const scanner = new ElementFragmentScanner();

  for await (const chunk of source) {
    const text = typeof chunk === 'string' ? chunk : decoder.decode(chunk, { stream: true });
    for (const fragment of scanner.push(text)) {
      if (kinds.has(fragment.kind)) {
        yield parseElementFragment(fragment);
      }
    }
  }

  const tail = decoder.decode();
  for (const fragment of scanner.push(tail)) {
    if (kinds.has(fragment.kind)) {
      yield parseElementFragment(fragment);
    }
  }
  scanner.end();
}

/**
 * Collect every element of a document into memory. Intended for tests and
 * small extracts.
 */
export async function readAllOsmElements(input: OsmInput, options: ReadOsmOptions = {}): Promise<RawElement[]> {
  const elements: RawElement[] = [];
  for await (const element of readOsmElements(input, options)) {
    elements.push(element);
  }
  return elements;
}

// ============================================================================
// Fragment Parsing
// ============================================================================

/**
 * Parse the XML text of one element
 */
export function parseElementFragment(fragment: ElementFragment): RawElement {
  let document: unknown;
  try {
    document = parser.parse(fragment.xml, true);
  } catch (error) {
    throw new OsmParseError(
      `Invalid <${fragment.kind}> element: ${error instanceof Error ? error.message : String(error)}`,
      fragment.offset
    );
  }

  const root = isRecord(document) ? document[fragment.kind] : undefined;
  const body = isRecord(root) ? root : {};

  return {
    kind: fragment.kind,
    attributes: readAttributes(body),
    tags: childRecords(body, 'tag').map((tag) => toRawTag(tag, fragment)),
    nodeRefs: fragment.kind === 'way' ? childRecords(body, 'nd').map(toRawNodeRef) : [],
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readAttributes(body: Record<string, unknown>): Record<string, string> {
  const attributes: Record<string, string> = {};
  for (const [name, value] of Object.entries(body)) {
    if (name.startsWith(ATTRIBUTE_PREFIX) && typeof value === 'string') {
      attributes[name.slice(ATTRIBUTE_PREFIX.length)] = value;
    }
  }
  return attributes;
}

function childRecords(body: Record<string, unknown>, name: string): Record<string, unknown>[] {
  const children = body[name];
  if (!Array.isArray(children)) {
    return [];
  }
  // A child without attributes parses to an empty string
  return children.map((child: unknown) => (isRecord(child) ? child : {}));
}

function toRawTag(tag: Record<string, unknown>, fragment: ElementFragment): RawTag {
  const attributes = readAttributes(tag);
  const key = attributes.k;
  const value = attributes.v;
  if (key === undefined || value === undefined) {
    throw new OsmParseError(`<tag> inside <${fragment.kind}> needs both k and v`, fragment.offset);
  }
  return { key, value };
}

function toRawNodeRef(nd: Record<string, unknown>): RawNodeRef {
  return { ref: readAttributes(nd).ref };
}
