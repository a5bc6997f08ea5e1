/**
 * Evac Atlas CLI Configuration Management
 *
 * Loads configuration from .evac-atlasrc (YAML or JSON) with environment
 * variable overrides and defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (EVAC_ATLAS_*)
 * 3. Config file (.evac-atlasrc or --config path)
 * 4. Default values
 *
 * Relative paths in a config file resolve against the file's directory.
 *
 * @module cli/lib/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

import { ConfigError, errorMessage } from '../../core/errors.js';
import { parseLogLevel, type LogLevel } from '../../core/utils/logger.js';
import { DEFAULT_DELIMITER } from '../../ingestion/alert-loader.js';
import { DEFAULT_REFERENCE_PATH } from '../../registry/reference-loader.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface PathsConfig {
  /** Census county table used to build the registry */
  readonly reference: string;
  /** Directory for written datasets */
  readonly output: string;
}

export interface InputConfig {
  readonly delimiter: string;
  readonly encoding: BufferEncoding;
}

export interface LoggingConfig {
  readonly level: LogLevel;
}

/**
 * Full CLI configuration
 */
export interface EvacAtlasConfig {
  readonly version: number;
  readonly paths: PathsConfig;
  readonly input: InputConfig;
  readonly logging: LoggingConfig;

  // Runtime overrides (from CLI flags)
  readonly verbose: boolean;
  readonly json: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

const EncodingSchema = z
  .string()
  .refine((value): value is BufferEncoding => Buffer.isEncoding(value), 'unsupported text encoding');

/**
 * Config file structure
 */
const ConfigFileSchema = z
  .object({
    version: z.number().int().positive().optional(),
    paths: z
      .object({
        reference: z.string().min(1).optional(),
        output: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    input: z
      .object({
        delimiter: z.string().length(1).optional(),
        encoding: EncodingSchema.optional(),
      })
      .strict()
      .optional(),
    logging: z
      .object({
        level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

type ConfigFileContents = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: Omit<EvacAtlasConfig, 'verbose' | 'json' | 'configPath'> = {
  version: 1,
  paths: {
    reference: DEFAULT_REFERENCE_PATH,
    output: './data/output',
  },
  input: {
    delimiter: DEFAULT_DELIMITER,
    encoding: 'utf-8',
  },
  logging: {
    level: 'info',
  },
};

// ============================================================================
// Configuration Loading
// ============================================================================

const CONFIG_FILE_NAMES = [
  '.evac-atlasrc',
  '.evac-atlasrc.yaml',
  '.evac-atlasrc.yml',
  '.evac-atlasrc.json',
];

/**
 * Find config file in a directory or its parents
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
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Parse and validate config file content
 *
 * @throws ConfigError when the file is unreadable, not YAML/JSON, or has unknown keys
 */
function parseConfigFile(filePath: string): ConfigFileContents {
  let raw: unknown;
  try {
    const content = readFileSync(filePath, 'utf-8');
    // YAML is a superset of JSON, so one parser covers every file name
    raw = parseYaml(content) ?? {};
  } catch (error) {
    throw new ConfigError(`Cannot read config file: ${errorMessage(error)}`, filePath, {
      cause: error,
    });
  }

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config file: ${details}`, filePath);
  }
  return parsed.data;
}

type Environment = Readonly<Record<string, string | undefined>>;

function envVar(env: Environment, name: string): string | undefined {
  const value = env[`EVAC_ATLAS_${name}`];
  return value === undefined || value === '' ? undefined : value;
}

function envBool(env: Environment, name: string): boolean | undefined {
  const value = envVar(env, name);
  if (value === undefined) return undefined;
  return value.toLowerCase() === 'true' || value === '1';
}

function envEncoding(env: Environment): BufferEncoding | undefined {
  const value = envVar(env, 'ENCODING');
  if (value === undefined) return undefined;
  const parsed = EncodingSchema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigError(`EVAC_ATLAS_ENCODING is not a supported encoding: ${value}`, null);
  }
  return parsed.data;
}

/**
 * Load configuration options
 */
export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Directory to start the config file search from (default: cwd) */
  cwd?: string;
  /** Environment to read overrides from (default: process.env) */
  env?: Environment;
  /** CLI flag overrides */
  overrides?: {
    reference?: string;
    output?: string;
    delimiter?: string;
    logLevel?: LogLevel;
    verbose?: boolean;
    json?: boolean;
  };
}

/**
 * Load and merge configuration from all sources
 *
 * @throws ConfigError for a missing explicit config file or invalid contents
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<EvacAtlasConfig> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  let configPath: string | null = null;
  let fileConfig: ConfigFileContents = {};

  const explicitPath = options.configPath ?? envVar(env, 'CONFIG');
  if (explicitPath) {
    configPath = resolve(cwd, explicitPath);
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`, configPath);
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    configPath = findConfigFile(cwd);
    if (configPath) {
      fileConfig = parseConfigFile(configPath);
    }
  }

  const fileDir = configPath ? dirname(configPath) : cwd;
  const fromFile = (path: string | undefined): string | undefined =>
    path === undefined ? undefined : resolve(fileDir, path);

  const verbose = options.overrides?.verbose ?? envBool(env, 'VERBOSE') ?? false;

  return {
    version: fileConfig.version ?? DEFAULT_CONFIG.version,

    paths: {
      reference:
        options.overrides?.reference ??
        envVar(env, 'REFERENCE') ??
        fromFile(fileConfig.paths?.reference) ??
        DEFAULT_CONFIG.paths.reference,
      output:
        options.overrides?.output ??
        envVar(env, 'OUTPUT_DIR') ??
        fromFile(fileConfig.paths?.output) ??
        DEFAULT_CONFIG.paths.output,
    },

    input: {
      delimiter:
        options.overrides?.delimiter ??
        envVar(env, 'DELIMITER') ??
        fileConfig.input?.delimiter ??
        DEFAULT_CONFIG.input.delimiter,
      encoding: envEncoding(env) ?? fileConfig.input?.encoding ?? DEFAULT_CONFIG.input.encoding,
    },

    logging: {
      level:
        options.overrides?.logLevel ??
        (verbose ? 'debug' : undefined) ??
        parseLogLevel(envVar(env, 'LOG_LEVEL'), fileConfig.logging?.level ?? DEFAULT_CONFIG.logging.level),
    },

    verbose,
    json: options.overrides?.json ?? envBool(env, 'JSON') ?? false,
    configPath,
  };
}
