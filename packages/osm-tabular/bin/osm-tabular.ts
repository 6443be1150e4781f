#!/usr/bin/env tsx
/**
 * OSM Tabular CLI Entry Point
 *
 * @module osm-tabular-cli
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';

import {
  createCLILogger,
  createCommandContext,
  EXIT_CODES,
  loadConfig,
  registerAuditCommand,
  registerProcessCommand,
  type CommandContext,
} from '../src/cli/index.js';
import { getPackageRoot } from '../src/core/utils/paths.js';

// ============================================================================
// Global State
// ============================================================================

let globalContext: CommandContext | null = null;

function getGlobalContext(): CommandContext {
  if (!globalContext) {
    throw new Error('Global context not initialized. Call initializeContext first.');
  }
  return globalContext;
}

// ============================================================================
// CLI Setup
// ============================================================================

function getVersion(): string {
  const content = readFileSync(join(getPackageRoot(), 'package.json'), 'utf-8');
  const packageJson: unknown = JSON.parse(content);
  if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
    return typeof packageJson.version === 'string' ? packageJson.version : '0.0.0';
  }
  return '0.0.0';
}

async function initializeContext(options: Record<string, unknown>): Promise<CommandContext> {
  const config = await loadConfig({
    configPath: typeof options.config === 'string' ? options.config : undefined,
    overrides: {
      verbose: options.verbose === true ? true : undefined,
      json: options.json === true ? true : undefined,
    },
  });

  const logger = createCLILogger({
    level: config.logLevel,
    json: config.json,
  });

  globalContext = createCommandContext(config, logger);
  return globalContext;
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('osm-tabular')
    .description('Normalize OpenStreetMap XML extracts into tabular node/way records')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .osm-tabularrc)')
    .hook('preAction', async (thisCommand) => {
      try {
        await initializeContext(thisCommand.opts());
      } catch (error) {
        console.error(`Configuration error: ${error instanceof Error ? error.message : String(error)}`);
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }
    });

  registerProcessCommand(program, getGlobalContext);
  registerAuditCommand(program, getGlobalContext);

  return program;
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (globalContext) {
      globalContext.logger.error('Command failed', {
        error: error instanceof Error ? error.message : String(error),
      });
    } else {
      console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    }
    process.exit(EXIT_CODES.ERRORS);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.ERRORS);
});
