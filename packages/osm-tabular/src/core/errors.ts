/**
 * OSM Tabular Error Types
 *
 * Element-level failures are returned as values inside a Result so the
 * caller decides whether to abort the run or skip the element. They extend
 * Error anyway so a caller that does throw them keeps a stack trace.
 *
 * @module core/errors
 */

import type { ElementKind, ShapeableKind, ShapedElement } from './types.js';

/**
 * Discriminator shared by element-level failures
 */
export type ElementFailureKind = 'missing_attribute' | 'validation' | 'write';

/**
 * One schema violation
 */
export interface ValidationIssue {
  /** Dotted path of the offending field, e.g. `tags.0.id` */
  readonly field: string;
  readonly message: string;
}

/**
 * A required top-level attribute (or `ref` on a way's node reference) is absent.
 *
 * The element is not shaped at all; no partial record set exists.
 */
export class MissingAttributeError extends Error {
  public readonly name = 'MissingAttributeError' as const;
  public readonly kind = 'missing_attribute' as const;

  constructor(
    public readonly elementKind: ElementKind,
    public readonly missing: readonly string[],
    public readonly elementId?: string
  ) {
    super(
      `${elementKind}${elementId !== undefined ? ` ${elementId}` : ''} is missing required attribute(s): ${missing.join(', ')}`
    );
    Object.setPrototypeOf(this, MissingAttributeError.prototype);
  }
}

/**
 * A shaped record set does not match the tabular contract.
 */
export class ValidationError extends Error {
  public readonly name = 'ValidationError' as const;
  public readonly kind = 'validation' as const;

  constructor(
    public readonly elementKind: ElementKind,
    public readonly issues: readonly ValidationIssue[],
    public readonly elementId?: number
  ) {
    super(ValidationError.describe(elementKind, issues));
    Object.setPrototypeOf(this, ValidationError.prototype);
  }

  /**
   * Names of every offending field
   */
  get fields(): readonly string[] {
    return [...new Set(this.issues.map((issue) => issue.field))];
  }

  private static describe(elementKind: ElementKind, issues: readonly ValidationIssue[]): string {
    const lines = [`Element of type '${elementKind}' has the following errors:`];
    for (const issue of issues) {
      lines.push(`${issue.field}: ${issue.message}`);
    }
    return lines.join('\n');
  }
}

/**
 * A sink's storage layer refused the records of one element (constraint
 * violation, unbindable value). None of that element's records were kept.
 */
export class WriteError extends Error {
  public readonly name = 'WriteError' as const;
  public readonly kind = 'write' as const;
  public readonly elementKind: ShapeableKind;
  public readonly elementId: number;

  constructor(
    public readonly shaped: ShapedElement,
    public readonly reason: string
  ) {
    const elementId = shaped.kind === 'node' ? shaped.node.id : shaped.way.id;
    super(`${shaped.kind} ${elementId} could not be stored: ${reason}`);
    this.elementKind = shaped.kind;
    this.elementId = elementId;
    Object.setPrototypeOf(this, WriteError.prototype);
  }
}

/**
 * Failure produced while shaping, validating or storing a single element
 */
export type ElementFailure = MissingAttributeError | ValidationError | WriteError;

/**
 * The XML stream could not be split into elements or an element fragment
 * could not be parsed.
 */
export class OsmParseError extends Error {
  public readonly name = 'OsmParseError' as const;

  constructor(
    message: string,
    public readonly offset?: number
  ) {
    super(offset !== undefined ? `${message} (near character ${offset})` : message);
    Object.setPrototypeOf(this, OsmParseError.prototype);
  }
}

/**
 * Configuration or rules file is unreadable or has the wrong shape.
 */
export class ConfigError extends Error {
  public readonly name = 'ConfigError' as const;

  constructor(
    message: string,
    public readonly source?: string
  ) {
    super(source ? `${message} (${source})` : message);
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/**
 * Raised by the pipeline when the error policy is `abort` and an element fails.
 *
 * Records already written for earlier elements stay in the sink.
 */
export class PipelineAbortError extends Error {
  public readonly name = 'PipelineAbortError' as const;

  constructor(
    public readonly failure: ElementFailure,
    public readonly elementIndex: number
  ) {
    super(`Processing aborted at element #${elementIndex}: ${failure.message}`);
    Object.setPrototypeOf(this, PipelineAbortError.prototype);
  }
}

// ============================================================================
// Type Guards
// ============================================================================

export function isMissingAttributeError(error: unknown): error is MissingAttributeError {
  return error instanceof MissingAttributeError;
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

export function isWriteError(error: unknown): error is WriteError {
  return error instanceof WriteError;
}

export function isElementFailure(error: unknown): error is ElementFailure {
  return isMissingAttributeError(error) || isValidationError(error) || isWriteError(error);
}

export function isPipelineAbortError(error: unknown): error is PipelineAbortError {
  return error instanceof PipelineAbortError;
}
