/**
 * SQLite Record Sink
 *
 * Writes the five record tables into one SQLite database.
 *
 * ARCHITECTURE:
 * - Synchronous better-sqlite3 with prepared inserts
 * - Records are buffered per element and flushed in batches, one
 *   transaction per batch
 * - A batch the database refuses is rolled back and replayed one element
 *   per transaction; only the refused elements are dropped and reported
 * - Schema is created by numbered migrations tracked in `schema_migrations`
 *
 * `ways_nodes.node_id` carries no foreign key: extracts routinely reference
 * nodes cut off at the bounding box.
 *
 * @module persistence/sqlite-sink
 */

import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { WriteError } from '../core/errors.js';
import type { NodeRecord, ShapedElement, TagRecord, WayNodeRecord, WayRecord } from '../core/types.js';
import type { RecordSink } from './sink.js';

// ============================================================================
// Public Types
// ============================================================================

export interface Migration {
  readonly version: number;
  readonly name: string;
  readonly up: (db: Database.Database) => void;
}

export interface SqliteSinkOptions {
  /** Elements per transaction (default 1000) */
  readonly batchSize?: number;
  /** Close the database in `close()`; set when the sink opened it */
  readonly closeDatabase?: boolean;
}

export const DEFAULT_BATCH_SIZE = 1000;

// ============================================================================
// Schema
// ============================================================================

export const MIGRATIONS: readonly Migration[] = [
  {
    version: 1,
    name: 'initial_schema',
    up: (db) => {
      db.exec(`
        CREATE TABLE nodes (
          id INTEGER PRIMARY KEY NOT NULL,
          lat REAL NOT NULL,
          lon REAL NOT NULL,
          user TEXT NOT NULL,
          uid INTEGER NOT NULL,
          version TEXT NOT NULL,
          changeset INTEGER NOT NULL,
          timestamp TEXT NOT NULL
        );

        CREATE TABLE nodes_tags (
          id INTEGER NOT NULL REFERENCES nodes(id),
          key TEXT NOT NULL,
          value TEXT NOT NULL,
          type TEXT NOT NULL
        );

        CREATE TABLE ways (
          id INTEGER PRIMARY KEY NOT NULL,
          user TEXT NOT NULL,
          uid INTEGER NOT NULL,
          version TEXT NOT NULL,
          changeset INTEGER NOT NULL,
          timestamp TEXT NOT NULL
        );

        CREATE TABLE ways_tags (
          id INTEGER NOT NULL REFERENCES ways(id),
          key TEXT NOT NULL,
          value TEXT NOT NULL,
          type TEXT NOT NULL
        );

        CREATE TABLE ways_nodes (
          id INTEGER NOT NULL REFERENCES ways(id),
          node_id INTEGER NOT NULL,
          position INTEGER NOT NULL
        );

        CREATE INDEX idx_nodes_tags_id ON nodes_tags(id);
        CREATE INDEX idx_ways_tags_id ON ways_tags(id);
        CREATE INDEX idx_ways_nodes_id ON ways_nodes(id, position);
      `);
    },
  },
];

/**
 * Apply pending migrations. Returns the resulting schema version.
 */
export function runMigrations(db: Database.Database, migrations: readonly Migration[] = MIGRATIONS): number {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
    );
  `);

  const current = getSchemaVersion(db);
  const apply = db.transaction(() => {
    for (const migration of migrations) {
      if (migration.version > current) {
        migration.up(db);
        db.prepare('INSERT INTO schema_migrations (version, name) VALUES (?, ?)').run(
          migration.version,
          migration.name
        );
      }
    }
  });
  apply();

  return getSchemaVersion(db);
}

export function getSchemaVersion(db: Database.Database): number {
  const row = db.prepare<[], { version: number | null }>('SELECT MAX(version) AS version FROM schema_migrations').get();
  return row?.version ?? 0;
}

// ============================================================================
// Sink
// ============================================================================

interface Statements {
  readonly node: Database.Statement<[number, number, number, string, number, string, number, string]>;
  readonly nodeTag: Database.Statement<[number, string, string, string]>;
  readonly way: Database.Statement<[number, string, number, string, number, string]>;
  readonly wayTag: Database.Statement<[number, string, string, string]>;
  readonly wayNode: Database.Statement<[number, number, number]>;
}

export class SqliteRecordSink implements RecordSink {
  private readonly statements: Statements;
  private readonly batchSize: number;
  private readonly closeDatabase: boolean;
  private readonly flushBatch: (batch: readonly ShapedElement[]) => void;
  private readonly insertOne: (shaped: ShapedElement) => void;
  private pending: ShapedElement[] = [];
  private closed = false;

  constructor(
    private readonly db: Database.Database,
    options: SqliteSinkOptions = {}
  ) {
    this.batchSize = Math.max(1, options.batchSize ?? DEFAULT_BATCH_SIZE);
    this.closeDatabase = options.closeDatabase ?? false;

    runMigrations(db);

    this.statements = {
      node: db.prepare<[number, number, number, string, number, string, number, string]>(
        'INSERT INTO nodes (id, lat, lon, user, uid, version, changeset, timestamp) VALUES (?, ?, ?, ?, ?, ?, ?, ?)'
      ),
      nodeTag: db.prepare<[number, string, string, string]>(
        'INSERT INTO nodes_tags (id, key, value, type) VALUES (?, ?, ?, ?)'
      ),
      way: db.prepare<[number, string, number, string, number, string]>(
        'INSERT INTO ways (id, user, uid, version, changeset, timestamp) VALUES (?, ?, ?, ?, ?, ?)'
      ),
      wayTag: db.prepare<[number, string, string, string]>(
        'INSERT INTO ways_tags (id, key, value, type) VALUES (?, ?, ?, ?)'
      ),
      wayNode: db.prepare<[number, number, number]>(
        'INSERT INTO ways_nodes (id, node_id, position) VALUES (?, ?, ?)'
      ),
    };

    this.flushBatch = db.transaction((batch: readonly ShapedElement[]) => {
      for (const shaped of batch) {
        this.insert(shaped);
      }
    });
    this.insertOne = db.transaction((shaped: ShapedElement) => {
      this.insert(shaped);
    });
  }

  /**
   * Open (and create when needed) a database file
   */
  static open(dbPath: string, options: Omit<SqliteSinkOptions, 'closeDatabase'> = {}): SqliteRecordSink {
    if (dbPath !== ':memory:') {
      mkdirSync(dirname(dbPath), { recursive: true });
    }
    const db = new Database(dbPath);

    db.pragma('journal_mode = WAL');
    db.pragma('foreign_keys = ON');
    db.pragma('synchronous = NORMAL');
    db.pragma('temp_store = MEMORY');

    return new SqliteRecordSink(db, { ...options, closeDatabase: true });
  }

  async write(shaped: ShapedElement): Promise<readonly WriteError[]> {
    if (this.closed) {
      throw new Error('SqliteRecordSink is closed');
    }
    this.pending.push(shaped);
    return this.pending.length >= this.batchSize ? this.flushPending() : [];
  }

  /**
   * Commit buffered elements
   */
  async flush(): Promise<readonly WriteError[]> {
    return this.flushPending();
  }

  async close(): Promise<readonly WriteError[]> {
    if (this.closed) {
      return [];
    }
    try {
      return this.flushPending();
    } finally {
      this.closed = true;
      if (this.closeDatabase) {
        this.db.close();
      }
    }
  }

  private flushPending(): WriteError[] {
    if (this.pending.length === 0) {
      return [];
    }
    const batch = this.pending;
    this.pending = [];
    try {
      this.flushBatch(batch);
      return [];
    } catch (error) {
      if (!(error instanceof Database.SqliteError)) {
        throw error;
      }
      return this.replay(batch);
    }
  }

  /**
   * Insert each element in its own transaction, collecting the refused ones
   */
  private replay(batch: readonly ShapedElement[]): WriteError[] {
    const refused: WriteError[] = [];
    for (const shaped of batch) {
      try {
        this.insertOne(shaped);
      } catch (error) {
        if (!(error instanceof Database.SqliteError)) {
          throw error;
        }
        refused.push(new WriteError(shaped, error.message));
      }
    }
    return refused;
  }

  private insert(shaped: ShapedElement): void {
    if (shaped.kind === 'node') {
      this.insertNode(shaped.node);
      this.insertTags(this.statements.nodeTag, shaped.tags);
    } else {
      this.insertWay(shaped.way);
      this.insertTags(this.statements.wayTag, shaped.tags);
      this.insertWayNodes(shaped.wayNodes);
    }
  }

  private insertNode(node: NodeRecord): void {
    this.statements.node.run(
      node.id,
      node.lat,
      node.lon,
      node.user,
      node.uid,
      node.version,
      node.changeset,
      node.timestamp
    );
  }

  private insertWay(way: WayRecord): void {
    this.statements.way.run(way.id, way.user, way.uid, way.version, way.changeset, way.timestamp);
  }

  private insertTags(statement: Statements['nodeTag'], tags: readonly TagRecord[]): void {
    for (const tag of tags) {
      statement.run(tag.id, tag.key, tag.value, tag.type);
    }
  }

  private insertWayNodes(wayNodes: readonly WayNodeRecord[]): void {
    for (const wayNode of wayNodes) {
      this.statements.wayNode.run(wayNode.id, wayNode.node_id, wayNode.position);
    }
  }
}
