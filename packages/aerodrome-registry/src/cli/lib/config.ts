/**
 * Aerodrome Registry CLI Configuration Management
 *
 * Loads configuration from .aerodromerc (YAML) with environment variable
 * overrides and defaults. Provides a typed configuration interface for all
 * CLI operations.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (AERODROME_*)
 * 3. Config file (.aerodromerc or --config path)
 * 4. Default values
 *
 * @module cli/lib/config
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { InvalidArgumentError } from 'commander';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { DEFAULT_DIFF_THRESHOLDS, DEFAULT_PREVIEW_LIMIT } from '../../diff/diff-reporter.js';
import { DEFAULT_COUNTRY_TIMEZONES_PATH } from '../../sources/country-timezones.js';
import { DEFAULT_PRIMARY_URL, DEFAULT_SECONDARY_URL } from '../../sync/sync-service.js';
import { DEFAULT_SCHEMA_PATH } from '../../validation/registry-validator.js';

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Artifact and input locations. Relative paths resolve against the config
 * file's directory, or the working directory when there is no config file.
 */
export interface PathsConfig {
  readonly staging: string;
  readonly production: string;
  readonly backups: string;
  readonly overrides: string;
  readonly versionFile: string;
  readonly schema: string;
  readonly countryTimezones: string;
}

export interface SourcesConfig {
  readonly primaryUrl: string;
  readonly secondaryUrl: string;
  /** Per-request timeout in milliseconds */
  readonly timeoutMs: number;
}

export interface DiffConfig {
  readonly warnAddedAbove: number;
  readonly warnRemovedAbove: number;
  readonly previewLimit: number;
}

/**
 * Full CLI configuration
 */
export interface CLIConfig {
  /** Configuration file version */
  readonly version: number;
  readonly paths: PathsConfig;
  readonly sources: SourcesConfig;
  readonly diff: DiffConfig;

  // Runtime overrides (from CLI flags)
  /** Enable verbose output */
  readonly verbose: boolean;
  /** Output as JSON */
  readonly json: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();

/**
 * Config file structure (YAML or JSON)
 */
const ConfigFileSchema = z.object({
  version: z.literal(1).optional(),
  paths: z
    .object({
      staging: z.string().min(1),
      production: z.string().min(1),
      backups: z.string().min(1),
      overrides: z.string().min(1),
      version_file: z.string().min(1),
      schema: z.string().min(1),
      country_timezones: z.string().min(1),
    })
    .partial()
    .optional(),
  sources: z
    .object({
      primary_url: z.string().url(),
      secondary_url: z.string().url(),
      timeout_ms: positiveInt,
    })
    .partial()
    .optional(),
  diff: z
    .object({
      warn_added_above: nonNegativeInt,
      warn_removed_above: nonNegativeInt,
      preview_limit: positiveInt,
    })
    .partial()
    .optional(),
});

type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: Omit<CLIConfig, 'verbose' | 'json' | 'configPath'> = {
  version: 1,

  paths: {
    staging: './aerodromes-staging.json',
    production: './aerodromes.json',
    backups: './backups',
    overrides: './modifications/overrides',
    versionFile: './VERSION',
    schema: DEFAULT_SCHEMA_PATH,
    countryTimezones: DEFAULT_COUNTRY_TIMEZONES_PATH,
  },

  sources: {
    primaryUrl: DEFAULT_PRIMARY_URL,
    secondaryUrl: DEFAULT_SECONDARY_URL,
    timeoutMs: 60000,
  },

  diff: {
    warnAddedAbove: DEFAULT_DIFF_THRESHOLDS.warnAddedAbove,
    warnRemovedAbove: DEFAULT_DIFF_THRESHOLDS.warnRemovedAbove,
    previewLimit: DEFAULT_PREVIEW_LIMIT,
  },
};

// ============================================================================
// Configuration Loading
// ============================================================================

/**
 * Standard config file names to search for
 */
const CONFIG_FILE_NAMES = ['.aerodromerc', '.aerodromerc.yaml', '.aerodromerc.yml', '.aerodromerc.json'];

/**
 * Find config file in the given directory or its parents
 */
function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = resolve(dir, '..');
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Parse and check config file content
 */
function parseConfigFile(filePath: string): ConfigFile {
  const content = readFileSync(filePath, 'utf-8');

  // YAML is a superset of JSON, so one parser covers every file name
  const raw: unknown = parseYaml(content) ?? {};
  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid config file ${filePath}: ${details}`);
  }
  return parsed.data;
}

function envReader(env: NodeJS.ProcessEnv) {
  const get = (name: string): string | undefined => {
    const value = env[`AERODROME_${name}`];
    return value === '' ? undefined : value;
  };

  return {
    get,
    bool(name: string): boolean | undefined {
      const value = get(name);
      if (value === undefined) return undefined;
      return value.toLowerCase() === 'true' || value === '1';
    },
    number(name: string): number | undefined {
      const value = get(name);
      if (value === undefined) return undefined;
      const num = parseInt(value, 10);
      return isNaN(num) ? undefined : num;
    },
  };
}

/**
 * Load configuration options
 */
export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** CLI flag overrides */
  overrides?: {
    verbose?: boolean;
    json?: boolean;
    timeoutMs?: number;
  };
  /** Environment to read AERODROME_* variables from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Directory the config file search starts from (default: process.cwd()) */
  cwd?: string;
}

/**
 * Load and merge configuration from all sources
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<CLIConfig> {
  const env = envReader(options.env ?? process.env);
  const cwd = options.cwd ?? process.cwd();

  let configPath: string | null = null;
  let fileConfig: ConfigFile = {};

  const explicitPath = options.configPath ?? env.get('CONFIG');
  if (explicitPath) {
    configPath = resolve(cwd, explicitPath);
    if (!existsSync(configPath)) {
      throw new Error(`Config file not found: ${configPath}`);
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    configPath = findConfigFile(cwd);
    if (configPath) {
      fileConfig = parseConfigFile(configPath);
    }
  }

  const paths = fileConfig.paths;
  const sources = fileConfig.sources;
  const diff = fileConfig.diff;

  return {
    version: fileConfig.version ?? DEFAULT_CONFIG.version,

    paths: {
      staging: env.get('STAGING') ?? paths?.staging ?? DEFAULT_CONFIG.paths.staging,
      production: env.get('PRODUCTION') ?? paths?.production ?? DEFAULT_CONFIG.paths.production,
      backups: env.get('BACKUP_DIR') ?? paths?.backups ?? DEFAULT_CONFIG.paths.backups,
      overrides: env.get('OVERRIDES_DIR') ?? paths?.overrides ?? DEFAULT_CONFIG.paths.overrides,
      versionFile:
        env.get('VERSION_FILE') ?? paths?.version_file ?? DEFAULT_CONFIG.paths.versionFile,
      schema: env.get('SCHEMA') ?? paths?.schema ?? DEFAULT_CONFIG.paths.schema,
      countryTimezones:
        env.get('COUNTRY_TIMEZONES') ??
        paths?.country_timezones ??
        DEFAULT_CONFIG.paths.countryTimezones,
    },

    sources: {
      primaryUrl:
        env.get('PRIMARY_URL') ?? sources?.primary_url ?? DEFAULT_CONFIG.sources.primaryUrl,
      secondaryUrl:
        env.get('SECONDARY_URL') ?? sources?.secondary_url ?? DEFAULT_CONFIG.sources.secondaryUrl,
      timeoutMs:
        options.overrides?.timeoutMs ??
        env.number('TIMEOUT') ??
        sources?.timeout_ms ??
        DEFAULT_CONFIG.sources.timeoutMs,
    },

    diff: {
      warnAddedAbove: diff?.warn_added_above ?? DEFAULT_CONFIG.diff.warnAddedAbove,
      warnRemovedAbove: diff?.warn_removed_above ?? DEFAULT_CONFIG.diff.warnRemovedAbove,
      previewLimit: diff?.preview_limit ?? DEFAULT_CONFIG.diff.previewLimit,
    },

    // Runtime flags
    verbose: options.overrides?.verbose ?? env.bool('VERBOSE') ?? false,
    json: options.overrides?.json ?? env.bool('JSON') ?? false,
    configPath,
  };
}

/**
 * Resolve a configured path to an absolute one
 */
export function resolvePath(config: CLIConfig, pathKey: keyof PathsConfig, cwd = process.cwd()): string {
  const basePath = config.configPath ? resolve(config.configPath, '..') : cwd;
  return resolve(basePath, config.paths[pathKey]);
}

/**
 * commander argument parser for `--timeout <ms>`
 */
export function parseTimeoutOption(value: string): number {
  const timeoutMs = Number(value);
  if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
    throw new InvalidArgumentError('Timeout must be a positive integer (milliseconds).');
  }
  return timeoutMs;
}

/**
 * Validate configuration
 *
 * @throws Error if configuration is invalid
 */
export function validateConfig(config: CLIConfig): void {
  if (config.sources.timeoutMs <= 0) {
    throw new Error('Timeout must be a positive number');
  }
}
