/**
 * CLI Command Tests
 *
 * Commands run in-process against files in a temporary directory.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import Database from 'better-sqlite3';
import { executeAudit } from '../../../cli/commands/audit/index.js';
import { executeProcess } from '../../../cli/commands/process/index.js';
import { EXIT_CODES, type CommandContext } from '../../../cli/context.js';
import { loadConfig, type ConfigOverrides } from '../../../cli/lib/config.js';
import { CLILogger } from '../../../cli/lib/logger.js';
import { nodeXml, osmDocument, wayXml } from '../../utils/fixtures.js';

const NODE = { lat: '38.9', lon: '-77.03', user: 'mapper', uid: '42', version: '1', changeset: '5', timestamp: 't' };
const WAY = { user: 'mapper', uid: '42', version: '1', changeset: '6', timestamp: 't' };

const SAMPLE = osmDocument(
  nodeXml({ id: '1', ...NODE }, { amenity: 'pharmacy', name: 'CVS/pharmacy' }),
  nodeXml({ id: '2', ...NODE }),
  wayXml({ id: '10', ...WAY }, ['1', '2'], { 'addr:street': 'Benning Rd', 'tiger:county': 'Cook, IL' })
);

interface Harness {
  readonly context: CommandContext;
  readonly output: string[];
  readonly logs: string[];
}

describe('CLI commands', () => {
  let dir: string;
  let input: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'osm-cli-'));
    input = join(dir, 'sample.osm');
    writeFileSync(input, SAMPLE);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  async function harness(overrides: ConfigOverrides = {}, env: Record<string, string> = {}): Promise<Harness> {
    const output: string[] = [];
    const logs: string[] = [];
    const config = await loadConfig({ cwd: dir, env, overrides });
    const logger = new CLILogger({ level: 'info', json: config.json, color: false, write: (line) => logs.push(line) });
    return { context: { config, logger, print: (text) => output.push(text) }, output, logs };
  }

  describe('process', () => {
    it('writes CSV files and prints a record summary', async () => {
      const { context, output } = await harness();

      const code = await executeProcess(input, {}, context);

      expect(code).toBe(EXIT_CODES.SUCCESS);
      expect(output).toEqual([
        [
          'Table      | Records',
          '-----------+--------',
          'nodes      |       2',
          'nodes_tags |       2',
          'ways       |       1',
          'ways_tags  |       2',
          'ways_nodes |       2',
        ].join('\n'),
      ]);

      const out = join(dir, 'output');
      expect(readFileSync(join(out, 'nodes_tags.csv'), 'utf-8')).toBe(
        'id,key,value,type\n1,amenity,pharmacy,regular\n1,name,CVS,regular\n'
      );
      expect(readFileSync(join(out, 'ways_tags.csv'), 'utf-8')).toBe(
        'id,key,value,type\n10,street,Benning Road,addr\n10,county,Cook,tiger\n'
      );
    });

    it('writes SQLite when asked to and prints JSON stats', async () => {
      const { context, output } = await harness({ json: true });
      const database = join(dir, 'db', 'osm.sqlite');

      const code = await executeProcess(input, { format: 'sqlite', database }, context);

      expect(code).toBe(EXIT_CODES.SUCCESS);
      const summary: unknown = JSON.parse(output[0] ?? '');
      expect(summary).toMatchObject({ format: 'sqlite', output: database, nodes: 2, ways: 1, wayNodes: 2 });

      const db = new Database(database, { readonly: true });
      try {
        expect(db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM ways_nodes').get()?.n).toBe(2);
      } finally {
        db.close();
      }
    });

    it('exits with ERRORS and keeps earlier records when an element fails', async () => {
      writeFileSync(input, osmDocument(nodeXml({ id: '1', ...NODE }), '<node id="2" lon="0"/>', nodeXml({ id: '3', ...NODE })));
      const { context, logs } = await harness();

      const code = await executeProcess(input, {}, context);

      expect(code).toBe(EXIT_CODES.ERRORS);
      expect(logs.some((line) => line.includes('Processing aborted at element #1: node 2 is missing required attribute(s): lat'))).toBe(true);
      expect(readFileSync(join(dir, 'output', 'nodes.csv'), 'utf-8')).toBe(
        'id,lat,lon,user,uid,version,changeset,timestamp\n1,38.9,-77.03,mapper,42,1,5,t\n'
      );
    });

    it('logs which element stopped the run', async () => {
      writeFileSync(input, osmDocument(nodeXml({ id: '1', ...NODE }), '<node id="2" lon="0"/>'));
      const { context, logs } = await harness({ json: true });

      await executeProcess(input, {}, context);

      const entries = logs.map((line): unknown => JSON.parse(line));
      expect(entries).toContainEqual(
        expect.objectContaining({
          level: 'error',
          failure: 'missing_attribute',
          elementKind: 'node',
          elementId: '2',
          elementIndex: 1,
        })
      );
    });

    it('skips failing elements under the skip policy', async () => {
      writeFileSync(input, osmDocument(nodeXml({ id: '1', ...NODE }), '<node id="2" lon="0"/>', nodeXml({ id: '3', ...NODE })));
      const { context, output } = await harness({}, { OSM_TABULAR_ON_ERROR: 'skip' });

      const code = await executeProcess(input, {}, context);

      expect(code).toBe(EXIT_CODES.SUCCESS);
      expect(output[1]).toBe('Skipped 1 element(s)');
    });

    it('exits with CONFIG_ERROR when the rules file is missing', async () => {
      const { context } = await harness({ rules: 'missing-rules.json' });
      expect(await executeProcess(input, {}, context)).toBe(EXIT_CODES.CONFIG_ERROR);
    });

    it('exits with ERRORS when the input file does not exist', async () => {
      const { context } = await harness();
      expect(await executeProcess(join(dir, 'absent.osm'), {}, context)).toBe(EXIT_CODES.ERRORS);
    });
  });

  describe('audit', () => {
    it('prints the chosen categories as JSON', async () => {
      const { context, output } = await harness();

      const code = await executeAudit(input, { categories: ['county', 'pharmacy'], json: true }, context);

      expect(code).toBe(EXIT_CODES.SUCCESS);
      expect(JSON.parse(output[0] ?? '')).toEqual({ pharmacy: ['CVS/pharmacy'], county: ['Cook, IL'] });
    });

    it('prints the text report by default', async () => {
      const { context, output } = await harness();

      await executeAudit(input, { categories: ['street'] }, context);

      expect(output).toEqual(['Unexpected street types: 1\n  Rd: Benning Rd']);
    });
  });
});
