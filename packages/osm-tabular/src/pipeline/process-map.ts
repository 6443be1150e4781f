/**
 * Map Processing Pipeline
 *
 * Drives elements through shape → (validate) → sink, one at a time and in
 * source order. A failing element never reaches the sink; the error policy
 * decides whether the run stops there or continues with the next element.
 *
 * Elements the sink refuses (reported when a batch is stored, so possibly a
 * few elements later) go through the same policy and are taken back out of
 * the counts.
 *
 * @module pipeline/process-map
 */

import { PipelineAbortError, type ElementFailure, type WriteError } from '../core/errors.js';
import type { RawElement, Result, ShapedElement } from '../core/types.js';
import { createLogger, type StructuredLogger } from '../core/utils/logger.js';
import type { NormalizerRegistry } from '../normalizers/registry.js';
import type { RecordSink } from '../persistence/sink.js';
import { shapeElement } from '../transformation/shaper.js';
import { validateShapedElement } from '../validators/record-schema.js';

export type ErrorPolicy = 'abort' | 'skip';

export const ERROR_POLICIES: readonly ErrorPolicy[] = ['abort', 'skip'];

export interface ProcessMapOptions {
  /** Validate every shaped element before writing (default false) */
  readonly validate?: boolean;
  /** Default `abort` */
  readonly onError?: ErrorPolicy;
  readonly registry?: NormalizerRegistry;
  readonly defaultTagType?: string;
  readonly logger?: StructuredLogger;
  /** Log a progress line every N elements; 0 disables (default 100000) */
  readonly progressInterval?: number;
}

/**
 * Skipped element, as reported in the stats
 */
export interface FailureSummary {
  /** Zero-based index of the element in the input */
  readonly index: number;
  readonly kind: ElementFailure['kind'];
  readonly elementKind: RawElement['kind'];
  readonly elementId?: string;
  readonly message: string;
}

export interface ProcessStats {
  /** Elements read, including ignored relations */
  readonly elements: number;
  readonly nodes: number;
  readonly ways: number;
  readonly nodeTags: number;
  readonly wayTags: number;
  readonly wayNodes: number;
  /** Elements of kinds that produce no records */
  readonly ignored: number;
  readonly skipped: number;
  readonly failures: readonly FailureSummary[];
  readonly durationMs: number;
}

interface ElementOrigin {
  readonly index: number;
  readonly element: RawElement;
}

const DEFAULT_PROGRESS_INTERVAL = 100_000;

const defaultLogger = createLogger({ module: 'pipeline' });

/**
 * Shape (and optionally validate) every element and hand the records to
 * `sink`. The sink is flushed at the end but left open; the caller closes it.
 *
 * @throws PipelineAbortError on the first failure when `onError` is `abort`
 */
export async function processMap(
  elements: AsyncIterable<RawElement> | Iterable<RawElement>,
  sink: RecordSink,
  options: ProcessMapOptions = {}
): Promise<ProcessStats> {
  const log = options.logger ?? defaultLogger;
  const policy = options.onError ?? 'abort';
  const validate = options.validate ?? false;
  const progressInterval = options.progressInterval ?? DEFAULT_PROGRESS_INTERVAL;
  const startTime = Date.now();

  const counts = { elements: 0, nodes: 0, ways: 0, nodeTags: 0, wayTags: 0, wayNodes: 0, ignored: 0 };
  const failures: FailureSummary[] = [];
  const origins = new WeakMap<ShapedElement, ElementOrigin>();

  const fail = (failure: ElementFailure, origin: ElementOrigin): void => {
    if (policy === 'abort') {
      throw new PipelineAbortError(failure, origin.index);
    }
    const summary = summarizeFailure(failure, origin.element, origin.index);
    failures.push(summary);
    log.warn('Skipping element', { ...summary });
  };

  const tally = (shaped: ShapedElement, sign: 1 | -1): void => {
    if (shaped.kind === 'node') {
      counts.nodes += sign;
      counts.nodeTags += sign * shaped.tags.length;
    } else {
      counts.ways += sign;
      counts.wayTags += sign * shaped.tags.length;
      counts.wayNodes += sign * shaped.wayNodes.length;
    }
  };

  const refuse = (refused: readonly WriteError[]): void => {
    for (const failure of refused) {
      const origin = origins.get(failure.shaped);
      if (origin === undefined) {
        throw new Error(`Sink refused an element it was not given: ${failure.message}`);
      }
      tally(failure.shaped, -1);
      fail(failure, origin);
    }
  };

  for await (const element of elements) {
    const index = counts.elements;
    counts.elements++;

    const outcome = processElement(element, validate, options);
    if (!outcome.ok) {
      fail(outcome.error, { index, element });
      continue;
    }

    const shaped = outcome.value;
    if (shaped === null) {
      counts.ignored++;
      continue;
    }

    origins.set(shaped, { index, element });
    tally(shaped, 1);
    refuse(await sink.write(shaped));

    if (progressInterval > 0 && counts.elements % progressInterval === 0) {
      log.debug('Progress', { elements: counts.elements, nodes: counts.nodes, ways: counts.ways });
    }
  }

  refuse(await sink.flush());
  failures.sort((a, b) => a.index - b.index);

  const stats: ProcessStats = {
    ...counts,
    skipped: failures.length,
    failures,
    durationMs: Date.now() - startTime,
  };

  log.info('Processing complete', {
    elements: stats.elements,
    nodes: stats.nodes,
    ways: stats.ways,
    skipped: stats.skipped,
    durationMs: stats.durationMs,
  });

  return stats;
}

function processElement(element: RawElement, validate: boolean, options: ProcessMapOptions): Result<ShapedElement | null, ElementFailure> {
  const shapedResult = shapeElement(element, {
    registry: options.registry,
    defaultTagType: options.defaultTagType,
  });
  if (!shapedResult.ok || shapedResult.value === null || !validate) {
    return shapedResult;
  }
  return validateShapedElement(shapedResult.value);
}

function summarizeFailure(failure: ElementFailure, element: RawElement, index: number): FailureSummary {
  const elementId = element.attributes.id;
  return {
    index,
    kind: failure.kind,
    elementKind: element.kind,
    ...(elementId !== undefined ? { elementId } : {}),
    message: failure.message,
  };
}
