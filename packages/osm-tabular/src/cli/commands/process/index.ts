/**
 * Process Command
 *
 * Converts an OSM XML file into the five record tables.
 *
 * Usage:
 *   osm-tabular process <file> [options]
 *
 * Options:
 *   --format <fmt>        csv | sqlite
 *   --out <dir>           CSV output directory
 *   --database <path>     SQLite database file
 *   --validate            Validate every element before writing
 *   --on-error <policy>   abort | skip
 *   --batch-size <n>      Elements per SQLite transaction
 */

import { Option, type Command } from 'commander';
import { isElementFailure, isPipelineAbortError } from '../../../core/errors.js';
import { readOsmElements } from '../../../ingestion/osm-reader.js';
import { createNormalizerRules, NormalizerRegistry } from '../../../normalizers/registry.js';
import { CsvRecordSink } from '../../../persistence/csv-sink.js';
import type { RecordSink, SinkFormat } from '../../../persistence/sink.js';
import { SqliteRecordSink } from '../../../persistence/sqlite-sink.js';
import { processMap, type ErrorPolicy, type ProcessStats } from '../../../pipeline/process-map.js';
import { EXIT_CODES, exitCodeForError, resolveRules, type CommandContext, type ExitCode } from '../../context.js';
import type { CLILogger, LogMetadata } from '../../lib/logger.js';
import { formatJson, formatTable } from '../../lib/output.js';

/**
 * Process options from CLI
 */
export interface ProcessOptions {
  readonly format?: SinkFormat;
  readonly out?: string;
  readonly database?: string;
  readonly validate?: boolean;
  readonly onError?: ErrorPolicy;
  readonly batchSize?: number;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Expected a positive integer, got "${value}"`);
  }
  return parsed;
}

function isSinkFormat(value: unknown): value is SinkFormat {
  return value === 'csv' || value === 'sqlite';
}

function isErrorPolicy(value: unknown): value is ErrorPolicy {
  return value === 'abort' || value === 'skip';
}

/**
 * Register the process command
 */
export function registerProcessCommand(program: Command, getContext: () => CommandContext): void {
  program
    .command('process')
    .description('Convert an OSM XML extract into node/way tables')
    .argument('<file>', 'OSM XML file')
    .addOption(new Option('--format <fmt>', 'Output format').choices(['csv', 'sqlite']))
    .option('--out <dir>', 'CSV output directory')
    .option('--database <path>', 'SQLite database file')
    .option('--validate', 'Validate every element against the table schema')
    .addOption(new Option('--on-error <policy>', 'What to do with a failing element').choices(['abort', 'skip']))
    .option('--batch-size <n>', 'Elements per SQLite transaction', parsePositiveInt)
    .action(async (file: string, raw: Record<string, unknown>) => {
      const options: ProcessOptions = {
        format: isSinkFormat(raw.format) ? raw.format : undefined,
        out: typeof raw.out === 'string' ? raw.out : undefined,
        database: typeof raw.database === 'string' ? raw.database : undefined,
        validate: raw.validate === true ? true : undefined,
        onError: isErrorPolicy(raw.onError) ? raw.onError : undefined,
        batchSize: typeof raw.batchSize === 'number' ? raw.batchSize : undefined,
      };
      process.exitCode = await executeProcess(file, options, getContext());
    });
}

/**
 * Execute the process command
 */
export async function executeProcess(
  file: string,
  options: ProcessOptions,
  context: CommandContext
): Promise<ExitCode> {
  const { config, logger } = context;
  const format = options.format ?? config.process.format;
  const onError = options.onError ?? config.process.onError;
  const validate = options.validate ?? config.process.validate;
  const output = format === 'csv' ? (options.out ?? config.paths.output) : (options.database ?? config.paths.database);

  logger.commandStart('process', { file, format, output, validate, onError });

  let sink: RecordSink | null = null;
  try {
    const registry = new NormalizerRegistry(createNormalizerRules(resolveRules(config)));
    sink =
      format === 'csv'
        ? CsvRecordSink.open(output)
        : SqliteRecordSink.open(output, { batchSize: options.batchSize ?? config.process.batchSize });

    const stats = await processMap(readOsmElements(file, { kinds: ['node', 'way'] }), sink, {
      validate,
      onError,
      registry,
      defaultTagType: config.process.defaultTagType,
      logger,
    });
    const closing = sink;
    sink = null;
    await closeSink(closing, logger);

    printSummary(stats, format, output, context);
    if (stats.skipped > 0) {
      logger.warn('Skipped failing elements', { skipped: stats.skipped });
    }
    logger.commandEnd(true, { nodes: stats.nodes, ways: stats.ways, skipped: stats.skipped });
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    logger.error(error instanceof Error ? error.message : String(error), failureMetadata(error));
    logger.commandEnd(false);
    return exitCodeForError(error);
  } finally {
    // Keep what earlier elements wrote
    if (sink !== null) {
      await closeSink(sink, logger);
    }
  }
}

async function closeSink(sink: RecordSink, logger: CLILogger): Promise<void> {
  for (const refused of await sink.close()) {
    logger.warn('Element refused by the database', {
      elementKind: refused.elementKind,
      elementId: refused.elementId,
      reason: refused.reason,
    });
  }
}

/**
 * Log fields identifying the element that stopped the run
 */
function failureMetadata(error: unknown): LogMetadata | undefined {
  const failure = isPipelineAbortError(error) ? error.failure : error;
  if (!isElementFailure(failure)) {
    return undefined;
  }
  return {
    failure: failure.kind,
    elementKind: failure.elementKind,
    ...(failure.elementId !== undefined && { elementId: failure.elementId }),
    ...(isPipelineAbortError(error) && { elementIndex: error.elementIndex }),
  };
}

function printSummary(stats: ProcessStats, format: SinkFormat, output: string, context: CommandContext): void {
  if (context.logger.json) {
    context.print(formatJson({ format, output, ...stats }));
    return;
  }

  const rows = [
    { table: 'nodes', records: stats.nodes },
    { table: 'nodes_tags', records: stats.nodeTags },
    { table: 'ways', records: stats.ways },
    { table: 'ways_tags', records: stats.wayTags },
    { table: 'ways_nodes', records: stats.wayNodes },
  ];
  context.print(
    formatTable(rows, [
      { key: 'table', header: 'Table' },
      { key: 'records', header: 'Records', align: 'right' },
    ])
  );
  if (stats.skipped > 0) {
    context.print(`Skipped ${stats.skipped} element(s)`);
  }
}
