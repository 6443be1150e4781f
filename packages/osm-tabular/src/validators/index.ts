export {
  validateShapedElement,
  assertValidShapedElement,
  NodeRecordSchema,
  WayRecordSchema,
  TagRecordSchema,
  WayNodeRecordSchema,
  ShapedNodeSchema,
  ShapedWaySchema,
  ShapedElementSchema,
  type ValidationOutcome,
} from './record-schema.js';
