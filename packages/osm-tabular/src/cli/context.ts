/**
 * Shared state and exit codes for CLI commands
 *
 * @module cli/context
 */

import { ConfigError } from '../core/errors.js';
import { loadNormalizationRules, DEFAULT_RULES, type NormalizationRules } from '../normalizers/rules.js';
import type { CLIConfig } from './lib/config.js';
import type { CLILogger } from './lib/logger.js';
import { printOutput } from './lib/output.js';

// ============================================================================
// Exit Codes
// ============================================================================

export const EXIT_CODES = {
  SUCCESS: 0,
  ERRORS: 2,
  CONFIG_ERROR: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Configuration problems exit with CONFIG_ERROR; everything else that stops
 * a command (parse errors, aborted runs, unreadable input) with ERRORS.
 */
export function exitCodeForError(error: unknown): ExitCode {
  return error instanceof ConfigError ? EXIT_CODES.CONFIG_ERROR : EXIT_CODES.ERRORS;
}

// ============================================================================
// Command Context
// ============================================================================

export interface CommandContext {
  readonly config: CLIConfig;
  readonly logger: CLILogger;
  /** Writes command output (default: stdout) */
  readonly print: (output: string) => void;
}

export function createCommandContext(config: CLIConfig, logger: CLILogger): CommandContext {
  return { config, logger, print: printOutput };
}

/**
 * Rules named by the config, or the bundled ones
 */
export function resolveRules(config: CLIConfig): NormalizationRules {
  return config.paths.rules !== null ? loadNormalizationRules(config.paths.rules) : DEFAULT_RULES;
}
