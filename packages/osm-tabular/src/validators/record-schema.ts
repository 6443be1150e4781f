/**
 * Record Schema Validation
 *
 * Strict zod schemas mirroring the five output tables. Checks field
 * presence (no missing, no extra) and scalar types of a shaped element
 * before it is handed to a sink. Never repairs or mutates its input.
 *
 * Validation is noticeably slower than shaping; the pipeline only runs it
 * when asked to.
 *
 * @module validators/record-schema
 */

import { z } from 'zod';
import { ValidationError, type ValidationIssue } from '../core/errors.js';
import { err, ok, type Result, type ShapedElement } from '../core/types.js';

const Id = z.number().int().nonnegative();
const Coordinate = z.number().finite();

export const NodeRecordSchema = z
  .object({
    id: Id,
    lat: Coordinate.min(-90).max(90),
    lon: Coordinate.min(-180).max(180),
    user: z.string(),
    uid: z.number().int(),
    version: z.string(),
    changeset: z.number().int(),
    timestamp: z.string(),
  })
  .strict();

export const WayRecordSchema = z
  .object({
    id: Id,
    user: z.string(),
    uid: z.number().int(),
    version: z.string(),
    changeset: z.number().int(),
    timestamp: z.string(),
  })
  .strict();

export const TagRecordSchema = z
  .object({
    id: Id,
    key: z.string(),
    value: z.string(),
    type: z.string(),
  })
  .strict();

export const WayNodeRecordSchema = z
  .object({
    id: Id,
    node_id: Id,
    position: z.number().int().nonnegative(),
  })
  .strict();

export const ShapedNodeSchema = z
  .object({
    kind: z.literal('node'),
    node: NodeRecordSchema,
    tags: z.array(TagRecordSchema),
  })
  .strict();

export const ShapedWaySchema = z
  .object({
    kind: z.literal('way'),
    way: WayRecordSchema,
    tags: z.array(TagRecordSchema),
    wayNodes: z.array(WayNodeRecordSchema),
  })
  .strict();

export const ShapedElementSchema = z.discriminatedUnion('kind', [ShapedNodeSchema, ShapedWaySchema]);

export type ValidationOutcome = Result<ShapedElement, ValidationError>;

/**
 * Check a shaped element against the table contract
 */
export function validateShapedElement(shaped: ShapedElement): ValidationOutcome {
  const result = ShapedElementSchema.safeParse(shaped);
  if (result.success) {
    return ok(shaped);
  }

  const issues: ValidationIssue[] = result.error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
  return err(new ValidationError(shaped.kind, issues, ownerIdOf(shaped)));
}

/**
 * Throwing variant of `validateShapedElement`
 */
export function assertValidShapedElement(shaped: ShapedElement): ShapedElement {
  const outcome = validateShapedElement(shaped);
  if (!outcome.ok) {
    throw outcome.error;
  }
  return outcome.value;
}

function ownerIdOf(shaped: ShapedElement): number | undefined {
  const id = shaped.kind === 'node' ? shaped.node.id : shaped.way.id;
  return Number.isFinite(id) ? id : undefined;
}
