/**
 * OSM Tabular
 *
 * Streams OpenStreetMap XML extracts into five normalized record tables
 * (nodes, nodes_tags, ways, ways_tags, ways_nodes), cleaning street names,
 * phone numbers, postcodes, counties and pharmacy names on the way.
 *
 * @example
 * ```typescript
 * import { readOsmElements, processMap, CsvRecordSink } from 'osm-tabular';
 *
 * const sink = CsvRecordSink.open('./output');
 * const stats = await processMap(readOsmElements('extract.osm'), sink, { validate: true, onError: 'skip' });
 * await sink.close();
 * ```
 *
 * @module osm-tabular
 */

export * from './core/types.js';
export * from './core/errors.js';
export { Logger, createLogger, logger, type LogLevel, type LogMetadata, type StructuredLogger } from './core/utils/logger.js';
export * from './transformation/index.js';
export * from './normalizers/index.js';
export * from './validators/index.js';
export * from './ingestion/index.js';
export * from './persistence/index.js';
export * from './pipeline/index.js';
export * from './audit/index.js';
