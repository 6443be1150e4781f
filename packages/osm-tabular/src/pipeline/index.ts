/**
 * Pipeline Module
 *
 * @module pipeline
 */

export {
  ERROR_POLICIES,
  processMap,
  type ErrorPolicy,
  type FailureSummary,
  type ProcessMapOptions,
  type ProcessStats,
} from './process-map.js';
