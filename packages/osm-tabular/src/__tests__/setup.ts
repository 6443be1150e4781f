/**
 * Global Test Setup for OSM Tabular
 *
 * Library loggers read LOG_LEVEL when their module loads, so it is set here
 * before any test file imports them.
 */

import { afterEach, vi } from 'vitest';

process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'error';

afterEach(() => {
  vi.restoreAllMocks();
});
