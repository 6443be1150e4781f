/**
 * OSM Tabular Core Types
 *
 * Raw element shapes supplied by the XML reader and the tabular records the
 * shaper derives from them. Field names on the record types match the column
 * names of the CSV files and SQLite tables they are written to.
 *
 * @module core/types
 */

// ============================================================================
// Raw Elements (reader output)
// ============================================================================

/**
 * Top-level element kinds found in an OSM extract
 */
export type ElementKind = 'node' | 'way' | 'relation';

/**
 * Element kinds that produce records
 */
export type ShapeableKind = Exclude<ElementKind, 'relation'>;

/**
 * A `<tag k=".." v=".."/>` child as it appears in the source
 */
export interface RawTag {
  readonly key: string;
  readonly value: string;
}

/**
 * A `<nd ref=".."/>` child of a way. Position is implied by order.
 */
export interface RawNodeRef {
  readonly ref: string | undefined;
}

/**
 * One top-level element with its attribute bag and ordered children
 */
export interface RawElement {
  readonly kind: ElementKind;
  readonly attributes: Readonly<Record<string, string>>;
  readonly tags: readonly RawTag[];
  /** Only populated for ways */
  readonly nodeRefs: readonly RawNodeRef[];
}

// ============================================================================
// Shaped Records
// ============================================================================

export interface NodeRecord {
  readonly id: number;
  readonly lat: number;
  readonly lon: number;
  readonly user: string;
  readonly uid: number;
  readonly version: string;
  readonly changeset: number;
  readonly timestamp: string;
}

export interface WayRecord {
  readonly id: number;
  readonly user: string;
  readonly uid: number;
  readonly version: string;
  readonly changeset: number;
  readonly timestamp: string;
}

/**
 * Tag annotation. `type` is the namespace before the first colon of the
 * source key, or the default tag type when the key has no colon.
 */
export interface TagRecord {
  readonly id: number;
  readonly key: string;
  readonly value: string;
  readonly type: string;
}

export interface WayNodeRecord {
  readonly id: number;
  readonly node_id: number;
  readonly position: number;
}

export interface ShapedNode {
  readonly kind: 'node';
  readonly node: NodeRecord;
  readonly tags: readonly TagRecord[];
}

export interface ShapedWay {
  readonly kind: 'way';
  readonly way: WayRecord;
  readonly tags: readonly TagRecord[];
  readonly wayNodes: readonly WayNodeRecord[];
}

/**
 * Full record set derived from one element
 */
export type ShapedElement = ShapedNode | ShapedWay;

// ============================================================================
// Result Values
// ============================================================================

/**
 * Success-or-failure value returned by shaping and validation so callers can
 * decide between aborting the run and skipping the element.
 */
export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): { readonly ok: true; readonly value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { readonly ok: false; readonly error: E } {
  return { ok: false, error };
}

// ============================================================================
// Column Orders
// ============================================================================

/**
 * Column order of each table. Must match the order of the SQL table columns.
 */
export const NODE_FIELDS = [
  'id',
  'lat',
  'lon',
  'user',
  'uid',
  'version',
  'changeset',
  'timestamp',
] as const satisfies readonly (keyof NodeRecord)[];

export const TAG_FIELDS = ['id', 'key', 'value', 'type'] as const satisfies readonly (keyof TagRecord)[];

export const WAY_FIELDS = [
  'id',
  'user',
  'uid',
  'version',
  'changeset',
  'timestamp',
] as const satisfies readonly (keyof WayRecord)[];

export const WAY_NODE_FIELDS = ['id', 'node_id', 'position'] as const satisfies readonly (keyof WayNodeRecord)[];

/**
 * Logical tables the records are routed to
 */
export type TableName = 'nodes' | 'nodes_tags' | 'ways' | 'ways_tags' | 'ways_nodes';

export const TABLE_NAMES: readonly TableName[] = [
  'nodes',
  'nodes_tags',
  'ways',
  'ways_tags',
  'ways_nodes',
];
