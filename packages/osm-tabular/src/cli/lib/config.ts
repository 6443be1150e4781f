/**
 * OSM Tabular CLI Configuration Management
 *
 * Loads configuration from .osm-tabularrc (YAML or JSON) with environment
 * variable overrides and defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (OSM_TABULAR_*)
 * 3. Config file (.osm-tabularrc or --config path)
 * 4. Default values
 *
 * Relative paths from the config file resolve against the file's directory;
 * relative paths from flags and environment resolve against the working
 * directory.
 *
 * @module cli/lib/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError } from '../../core/errors.js';
import type { LogLevel } from '../../core/utils/logger.js';
import type { SinkFormat } from '../../persistence/sink.js';
import type { ErrorPolicy } from '../../pipeline/process-map.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface PathsConfig {
  /** Directory receiving the CSV files */
  readonly output: string;
  /** SQLite database file */
  readonly database: string;
  /** Normalization rules file; null uses the bundled rules */
  readonly rules: string | null;
}

export interface ProcessConfig {
  readonly format: SinkFormat;
  readonly validate: boolean;
  readonly onError: ErrorPolicy;
  /** Elements per SQLite transaction */
  readonly batchSize: number;
  /** Tag type for keys without a namespace */
  readonly defaultTagType: string;
}

/**
 * Full CLI configuration
 */
export interface CLIConfig {
  readonly version: 1;
  readonly paths: PathsConfig;
  readonly process: ProcessConfig;
  readonly logLevel: LogLevel;

  // Runtime flags
  readonly verbose: boolean;
  readonly json: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

// ============================================================================
// File Schema
// ============================================================================

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);
const FormatSchema = z.enum(['csv', 'sqlite']);
const ErrorPolicySchema = z.enum(['abort', 'skip']);
const BatchSizeSchema = z.number().int().positive();

const ConfigFileSchema = z
  .object({
    version: z.literal(1).optional(),
    paths: z
      .object({
        output: z.string().min(1).optional(),
        database: z.string().min(1).optional(),
        rules: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    process: z
      .object({
        format: FormatSchema.optional(),
        validate: z.boolean().optional(),
        on_error: ErrorPolicySchema.optional(),
        batch_size: BatchSizeSchema.optional(),
        default_tag_type: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    logging: z
      .object({
        level: LogLevelSchema.optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG = {
  version: 1,
  paths: {
    output: './output',
    database: './output/osm.sqlite',
  },
  process: {
    format: 'csv',
    validate: false,
    onError: 'abort',
    batchSize: 1000,
    defaultTagType: 'regular',
  },
  logLevel: 'info',
} as const satisfies {
  version: 1;
  paths: Omit<PathsConfig, 'rules'>;
  process: ProcessConfig;
  logLevel: LogLevel;
};

// ============================================================================
// Configuration Loading
// ============================================================================

export const CONFIG_FILE_NAMES = [
  '.osm-tabularrc',
  '.osm-tabularrc.yaml',
  '.osm-tabularrc.yml',
  '.osm-tabularrc.json',
] as const;

export const ENV_PREFIX = 'OSM_TABULAR_';

/**
 * Find config file in `startDir` or its parents
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

/**
 * Read and validate a config file
 *
 * @throws ConfigError when unreadable or not matching the schema
 */
export function parseConfigFile(filePath: string): ConfigFile {
  let raw: unknown;
  try {
    const content = readFileSync(filePath, 'utf-8');
    // YAML is a superset of JSON
    raw = filePath.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
  } catch (error) {
    throw new ConfigError(
      `Cannot read config file: ${error instanceof Error ? error.message : String(error)}`,
      filePath
    );
  }

  // An empty YAML document parses to null
  const result = ConfigFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config file: ${details}`, filePath);
  }
  return result.data;
}

export type Environment = Readonly<Record<string, string | undefined>>;

class EnvReader {
  constructor(private readonly env: Environment) {}

  string(name: string): string | undefined {
    const value = this.env[`${ENV_PREFIX}${name}`];
    return value === undefined || value === '' ? undefined : value;
  }

  bool(name: string): boolean | undefined {
    const value = this.string(name);
    if (value === undefined) return undefined;
    return value.toLowerCase() === 'true' || value === '1';
  }

  number(name: string): number | undefined {
    const value = this.string(name);
    if (value === undefined) return undefined;
    const num = Number(value);
    return BatchSizeSchema.safeParse(num).success ? num : this.invalid(name, value);
  }

  oneOf<T extends string>(name: string, schema: z.ZodType<T>): T | undefined {
    const value = this.string(name);
    if (value === undefined) return undefined;
    const result = schema.safeParse(value);
    return result.success ? result.data : this.invalid(name, value);
  }

  private invalid(name: string, value: string): never {
    throw new ConfigError(`Invalid value "${value}" for ${ENV_PREFIX}${name}`);
  }
}

export interface ConfigOverrides {
  readonly verbose?: boolean;
  readonly json?: boolean;
  readonly output?: string;
  readonly database?: string;
  readonly rules?: string;
  readonly format?: SinkFormat;
  readonly validate?: boolean;
  readonly onError?: ErrorPolicy;
  readonly batchSize?: number;
}

export interface LoadConfigOptions {
  /** Explicit config file path */
  readonly configPath?: string;
  /** CLI flag overrides */
  readonly overrides?: ConfigOverrides;
  /** Directory to search for a config file and resolve paths against (default: cwd) */
  readonly cwd?: string;
  /** Environment variables (default: process.env) */
  readonly env?: Environment;
}

/**
 * Load and merge configuration from all sources
 *
 * @throws ConfigError for a missing explicit config file or invalid values
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<CLIConfig> {
  const cwd = resolve(options.cwd ?? process.cwd());
  const env = new EnvReader(options.env ?? process.env);
  const overrides = options.overrides ?? {};

  // Find config file
  let configPath: string | null = null;
  const explicitPath = options.configPath ?? env.string('CONFIG');
  if (explicitPath !== undefined) {
    configPath = resolve(cwd, explicitPath);
    if (!existsSync(configPath)) {
      throw new ConfigError('Config file not found', configPath);
    }
  } else {
    configPath = findConfigFile(cwd);
  }

  const fileConfig: ConfigFile = configPath !== null ? parseConfigFile(configPath) : {};
  const fileDir = configPath !== null ? dirname(configPath) : cwd;

  const pathFrom = (override: string | undefined, envName: string, fromFile: string | undefined, fallback: string) => {
    const runtime = override ?? env.string(envName);
    if (runtime !== undefined) return resolve(cwd, runtime);
    if (fromFile !== undefined) return resolve(fileDir, fromFile);
    return resolve(cwd, fallback);
  };

  const rulesRuntime = overrides.rules ?? env.string('RULES');
  const verbose = overrides.verbose ?? env.bool('VERBOSE') ?? false;

  return {
    version: 1,

    paths: {
      output: pathFrom(overrides.output, 'OUTPUT_DIR', fileConfig.paths?.output, DEFAULT_CONFIG.paths.output),
      database: pathFrom(overrides.database, 'DATABASE', fileConfig.paths?.database, DEFAULT_CONFIG.paths.database),
      rules:
        rulesRuntime !== undefined
          ? resolve(cwd, rulesRuntime)
          : fileConfig.paths?.rules !== undefined
            ? resolve(fileDir, fileConfig.paths.rules)
            : null,
    },

    process: {
      format:
        overrides.format ?? env.oneOf('FORMAT', FormatSchema) ?? fileConfig.process?.format ?? DEFAULT_CONFIG.process.format,
      validate:
        overrides.validate ?? env.bool('VALIDATE') ?? fileConfig.process?.validate ?? DEFAULT_CONFIG.process.validate,
      onError:
        overrides.onError ??
        env.oneOf('ON_ERROR', ErrorPolicySchema) ??
        fileConfig.process?.on_error ??
        DEFAULT_CONFIG.process.onError,
      batchSize:
        overrides.batchSize ??
        env.number('BATCH_SIZE') ??
        fileConfig.process?.batch_size ??
        DEFAULT_CONFIG.process.batchSize,
      defaultTagType:
        env.string('DEFAULT_TAG_TYPE') ??
        fileConfig.process?.default_tag_type ??
        DEFAULT_CONFIG.process.defaultTagType,
    },

    logLevel: verbose
      ? 'debug'
      : env.oneOf('LOG_LEVEL', LogLevelSchema) ?? fileConfig.logging?.level ?? DEFAULT_CONFIG.logLevel,

    verbose,
    json: overrides.json ?? env.bool('JSON') ?? false,
    configPath,
  };
}
