/**
 * Element Shaper
 *
 * Turns one raw node or way into its record set:
 *
 *   node → NodeRecord + TagRecord[]
 *   way  → WayRecord + TagRecord[] + WayNodeRecord[]
 *
 * Tags pass through the problem-character filter, the namespace split and
 * the normalizer registry. Normalizer conditions look at the element's full
 * tag set (including tags the filter later drops), so every tag of the
 * element is read before the first TagRecord is built.
 *
 * Shaping never throws for bad input: a missing required attribute comes
 * back as a failed Result and nothing of that element is produced.
 *
 * @module transformation/shaper
 */

import { MissingAttributeError } from '../core/errors.js';
import {
  NODE_FIELDS,
  WAY_FIELDS,
  err,
  ok,
  type NodeRecord,
  type RawElement,
  type RawTag,
  type Result,
  type ShapeableKind,
  type ShapedElement,
  type ShapedNode,
  type ShapedWay,
  type TagRecord,
  type WayNodeRecord,
  type WayRecord,
} from '../core/types.js';
import { buildTagLookup, defaultNormalizerRegistry, type NormalizerRegistry } from '../normalizers/registry.js';
import { hasProblemChars } from './problem-chars.js';
import { DEFAULT_TAG_TYPE, parseTagKey } from './tag-key.js';

export const NODE_REQUIRED_ATTRIBUTES: readonly string[] = NODE_FIELDS;
export const WAY_REQUIRED_ATTRIBUTES: readonly string[] = WAY_FIELDS;

export interface ShapeOptions {
  /** Normalizer table; defaults to the bundled rules */
  readonly registry?: NormalizerRegistry;
  /** Tag type for keys without a namespace (default `regular`) */
  readonly defaultTagType?: string;
}

/**
 * `value` is null for element kinds that produce no records (relations)
 */
export type ShapeResult = Result<ShapedElement | null, MissingAttributeError>;

interface ShapeContext {
  readonly registry: NormalizerRegistry;
  readonly defaultTagType: string;
}

/**
 * Shape one element. See module docs.
 */
export function shapeElement(element: RawElement, options: ShapeOptions = {}): ShapeResult {
  const context: ShapeContext = {
    registry: options.registry ?? defaultNormalizerRegistry,
    defaultTagType: options.defaultTagType ?? DEFAULT_TAG_TYPE,
  };

  switch (element.kind) {
    case 'node':
      return shapeNode(element, context);
    case 'way':
      return shapeWay(element, context);
    default:
      return ok(null);
  }
}

/**
 * Same as `shapeElement` but throws the MissingAttributeError
 */
export function shapeElementOrThrow(element: RawElement, options: ShapeOptions = {}): ShapedElement | null {
  const result = shapeElement(element, options);
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

// ============================================================================
// Node / Way
// ============================================================================

function shapeNode(element: RawElement, context: ShapeContext): Result<ShapedNode, MissingAttributeError> {
  const missing = findMissingAttributes(element, NODE_REQUIRED_ATTRIBUTES);
  if (missing.length > 0) {
    return err(new MissingAttributeError('node', missing, element.attributes.id));
  }

  const attr = attributeReader(element);
  const node: NodeRecord = {
    id: toNumber(attr('id')),
    lat: toNumber(attr('lat')),
    lon: toNumber(attr('lon')),
    user: attr('user'),
    uid: toNumber(attr('uid')),
    version: attr('version'),
    changeset: toNumber(attr('changeset')),
    timestamp: attr('timestamp'),
  };

  const shaped: ShapedNode = {
    kind: 'node',
    node,
    tags: shapeTags('node', node.id, element.tags, context),
  };
  return ok(shaped);
}

function shapeWay(element: RawElement, context: ShapeContext): Result<ShapedWay, MissingAttributeError> {
  const missing = findMissingAttributes(element, WAY_REQUIRED_ATTRIBUTES);
  if (missing.length > 0) {
    return err(new MissingAttributeError('way', missing, element.attributes.id));
  }

  const attr = attributeReader(element);
  const way: WayRecord = {
    id: toNumber(attr('id')),
    user: attr('user'),
    uid: toNumber(attr('uid')),
    version: attr('version'),
    changeset: toNumber(attr('changeset')),
    timestamp: attr('timestamp'),
  };

  const wayNodes: WayNodeRecord[] = [];
  for (const [position, nodeRef] of element.nodeRefs.entries()) {
    if (nodeRef.ref === undefined) {
      return err(new MissingAttributeError('way', ['ref'], element.attributes.id));
    }
    wayNodes.push({ id: way.id, node_id: toNumber(nodeRef.ref), position });
  }

  const shaped: ShapedWay = {
    kind: 'way',
    way,
    tags: shapeTags('way', way.id, element.tags, context),
    wayNodes,
  };
  return ok(shaped);
}

// ============================================================================
// Tags
// ============================================================================

function shapeTags(
  kind: ShapeableKind,
  ownerId: number,
  tags: readonly RawTag[],
  context: ShapeContext
): TagRecord[] {
  const lookup = buildTagLookup(tags);
  const records: TagRecord[] = [];

  for (const tag of tags) {
    if (hasProblemChars(tag.key)) {
      continue;
    }
    // Rules are keyed on the raw key; defaultTagType only labels the output
    const ruleKey = parseTagKey(tag.key);
    const parsed = parseTagKey(tag.key, context.defaultTagType);
    records.push({
      id: ownerId,
      key: parsed.key,
      value: context.registry.apply(kind, ruleKey, tag.value, lookup),
      type: parsed.type,
    });
  }

  return records;
}

// ============================================================================
// Attributes
// ============================================================================

function findMissingAttributes(element: RawElement, required: readonly string[]): string[] {
  return required.filter((name) => !Object.hasOwn(element.attributes, name));
}

const DECIMAL = /^-?\d+(\.\d+)?$/;

/**
 * Plain decimal text to a number; anything else (empty, padded, hex,
 * exponent) becomes NaN for the validator to report
 */
export function toNumber(text: string): number {
  return DECIMAL.test(text) ? Number(text) : Number.NaN;
}

function attributeReader(element: RawElement): (name: string) => string {
  // Only called after findMissingAttributes passed
  return (name) => element.attributes[name] ?? '';
}
