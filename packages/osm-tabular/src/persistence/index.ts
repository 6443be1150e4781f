/**
 * Persistence Module
 *
 * @module persistence
 */

export type { RecordSink, SinkFormat } from './sink.js';
export { escapeCSV, formatCsvHeader, formatCsvRow } from './csv.js';
export { CsvRecordSink, TABLE_HEADERS, csvFileName, type TableStreams } from './csv-sink.js';
export {
  DEFAULT_BATCH_SIZE,
  MIGRATIONS,
  SqliteRecordSink,
  getSchemaVersion,
  runMigrations,
  type Migration,
  type SqliteSinkOptions,
} from './sqlite-sink.js';
