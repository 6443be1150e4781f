/**
 * Element shaping: tag key parsing, problem-character filtering and the shaper
 *
 * @module transformation
 */

export { parseTagKey, DEFAULT_TAG_TYPE, type ParsedTagKey } from './tag-key.js';
export { hasProblemChars, PROBLEM_CHARS } from './problem-chars.js';
export {
  shapeElement,
  shapeElementOrThrow,
  NODE_REQUIRED_ATTRIBUTES,
  WAY_REQUIRED_ATTRIBUTES,
  type ShapeOptions,
  type ShapeResult,
} from './shaper.js';
