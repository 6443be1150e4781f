/**
 * CSV Record Sink
 *
 * One CSV file per table, each opened with a header row in table field
 * order. Writes respect stream backpressure.
 *
 * @module persistence/csv-sink
 */

import { createWriteStream, mkdirSync } from 'node:fs';
import { once } from 'node:events';
import { join } from 'node:path';
import type { Writable } from 'node:stream';
import { finished } from 'node:stream/promises';
import type { WriteError } from '../core/errors.js';
import {
  NODE_FIELDS,
  TABLE_NAMES,
  TAG_FIELDS,
  WAY_FIELDS,
  WAY_NODE_FIELDS,
  type ShapedElement,
  type TableName,
  type TagRecord,
} from '../core/types.js';
import { formatCsvHeader, formatCsvRow } from './csv.js';
import type { RecordSink } from './sink.js';

export type TableStreams = Readonly<Record<TableName, Writable>>;

export const TABLE_HEADERS: Readonly<Record<TableName, readonly string[]>> = {
  nodes: NODE_FIELDS,
  nodes_tags: TAG_FIELDS,
  ways: WAY_FIELDS,
  ways_tags: TAG_FIELDS,
  ways_nodes: WAY_NODE_FIELDS,
};

/**
 * File name of each table inside the output directory
 */
export function csvFileName(table: TableName): string {
  return `${table}.csv`;
}

export class CsvRecordSink implements RecordSink {
  private closed = false;

  constructor(private readonly streams: TableStreams) {
    for (const table of TABLE_NAMES) {
      this.streams[table].write(formatCsvHeader(TABLE_HEADERS[table]));
    }
  }

  /**
   * Create `<table>.csv` files in `outDir`, replacing existing ones
   */
  static open(outDir: string): CsvRecordSink {
    mkdirSync(outDir, { recursive: true });
    const streams: Record<TableName, Writable> = {
      nodes: createWriteStream(join(outDir, csvFileName('nodes')), { encoding: 'utf-8' }),
      nodes_tags: createWriteStream(join(outDir, csvFileName('nodes_tags')), { encoding: 'utf-8' }),
      ways: createWriteStream(join(outDir, csvFileName('ways')), { encoding: 'utf-8' }),
      ways_tags: createWriteStream(join(outDir, csvFileName('ways_tags')), { encoding: 'utf-8' }),
      ways_nodes: createWriteStream(join(outDir, csvFileName('ways_nodes')), { encoding: 'utf-8' }),
    };
    return new CsvRecordSink(streams);
  }

  /**
   * Rows are written as they come; a text file refuses nothing, so the
   * result is always empty
   */
  async write(shaped: ShapedElement): Promise<readonly WriteError[]> {
    if (this.closed) {
      throw new Error('CsvRecordSink is closed');
    }

    if (shaped.kind === 'node') {
      await this.append('nodes', formatCsvRow(shaped.node, NODE_FIELDS));
      await this.appendTags('nodes_tags', shaped.tags);
      return [];
    }

    await this.append('ways', formatCsvRow(shaped.way, WAY_FIELDS));
    await this.appendTags('ways_tags', shaped.tags);
    for (const wayNode of shaped.wayNodes) {
      await this.append('ways_nodes', formatCsvRow(wayNode, WAY_NODE_FIELDS));
    }
    return [];
  }

  async flush(): Promise<readonly WriteError[]> {
    return [];
  }

  async close(): Promise<readonly WriteError[]> {
    if (this.closed) {
      return [];
    }
    this.closed = true;
    await Promise.all(
      TABLE_NAMES.map((table) => {
        const stream = this.streams[table];
        stream.end();
        return finished(stream);
      })
    );
    return [];
  }

  private async appendTags(table: 'nodes_tags' | 'ways_tags', tags: readonly TagRecord[]): Promise<void> {
    for (const tag of tags) {
      await this.append(table, formatCsvRow(tag, TAG_FIELDS));
    }
  }

  private async append(table: TableName, line: string): Promise<void> {
    const stream = this.streams[table];
    if (!stream.write(line)) {
      await once(stream, 'drain');
    }
  }
}
