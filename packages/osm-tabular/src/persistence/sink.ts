/**
 * Record sink contract shared by the CSV and SQLite writers
 *
 * @module persistence/sink
 */

import type { WriteError } from '../core/errors.js';
import type { ShapedElement } from '../core/types.js';

export interface RecordSink {
  /**
   * Persist every record of one element. Elements arrive in source order and
   * their records must be stored in that order.
   *
   * A batching sink may store earlier elements during this call. Resolves
   * with every element the storage layer refused on the way; the records of
   * the other elements are kept.
   */
  write(shaped: ShapedElement): Promise<readonly WriteError[]>;

  /**
   * Store buffered elements. Resolves with the ones refused.
   */
  flush(): Promise<readonly WriteError[]>;

  /**
   * Flush pending records and release resources. Resolves with the elements
   * the final flush refused.
   */
  close(): Promise<readonly WriteError[]>;
}

export type SinkFormat = 'csv' | 'sqlite';
