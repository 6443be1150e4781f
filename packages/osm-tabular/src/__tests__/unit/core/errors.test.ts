/**
 * Error Type Tests
 */

import { describe, it, expect } from 'vitest';
import {
  ConfigError,
  MissingAttributeError,
  PipelineAbortError,
  ValidationError,
  WriteError,
  isElementFailure,
  isPipelineAbortError,
  isWriteError,
} from '../../../core/errors.js';
import type { ShapedNode } from '../../../core/types.js';

const shaped: ShapedNode = {
  kind: 'node',
  node: { id: 7, lat: 1, lon: 2, user: 'mapper', uid: 42, version: '1', changeset: 5, timestamp: 't' },
  tags: [],
};

describe('element failures', () => {
  const missing = new MissingAttributeError('way', ['uid'], '12');
  const invalid = new ValidationError('node', [{ field: 'node.lat', message: 'Expected number, received nan' }], 7);
  const refused = new WriteError(shaped, 'UNIQUE constraint failed: nodes.id');

  it('recognizes every element failure kind', () => {
    expect([missing, invalid, refused].map(isElementFailure)).toEqual([true, true, true]);
    expect(isElementFailure(new ConfigError('bad'))).toBe(false);
    expect(isElementFailure('missing_attribute')).toBe(false);
  });

  it('describes a refused element by kind and id', () => {
    expect(isWriteError(refused)).toBe(true);
    expect(refused.kind).toBe('write');
    expect(refused.elementKind).toBe('node');
    expect(refused.elementId).toBe(7);
    expect(refused.message).toBe('node 7 could not be stored: UNIQUE constraint failed: nodes.id');
  });

  it('wraps the failure that aborted a run', () => {
    const abort = new PipelineAbortError(missing, 4);
    expect(isPipelineAbortError(abort)).toBe(true);
    expect(isPipelineAbortError(missing)).toBe(false);
    expect(abort.message).toBe('Processing aborted at element #4: way 12 is missing required attribute(s): uid');
  });
});
