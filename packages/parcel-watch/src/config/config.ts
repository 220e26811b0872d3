/**
 * parcel-watch Configuration Management
 *
 * Loads configuration from .parcel-watchrc (YAML or JSON) with environment
 * variable overrides and defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (PARCEL_WATCH_*)
 * 3. Config file (.parcel-watchrc or --config path)
 * 4. Default values
 *
 * Relative paths from the config file resolve against the file's directory;
 * relative paths from flags or environment resolve against the working
 * directory.
 *
 * @module config
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError } from '../core/errors.js';
import { formatIssuePath } from '../schemas/dataset.js';
import { DEFAULT_ID_FIELDS, createResolution } from '../schemas/field-resolution.js';
import type { SnapshotOptions } from '../snapshot/loader.js';

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * What to do when the watchlist file exists but cannot be read
 */
export type WatchlistInvalidPolicy = 'fail' | 'disable';

export interface PathsConfig {
  /** Dataset written by the fetcher */
  readonly current: string;
  /** Previous run's dataset */
  readonly baseline: string;
  /** Summary record output */
  readonly summary: string;
  /** Watchlist file; watch mode is on when this file exists */
  readonly watchlist: string | null;
}

export interface DiffConfig {
  readonly compareFields: readonly string[] | null;
  readonly ignoreFields: readonly string[];
}

export interface NotificationConfig {
  readonly sendWhenNoChanges: boolean;
  readonly truncationLimit: number;
  readonly title: string;
  readonly footer: string | null;
}

export interface SearchConfig {
  /** Attribute fields matched by `search` */
  readonly fields: readonly string[];
  readonly limit: number;
}

export interface ParcelWatchConfig {
  readonly version: number;
  readonly paths: PathsConfig;
  /** Parcel identifier candidates, highest priority first */
  readonly idFields: readonly string[];
  readonly diff: DiffConfig;
  readonly notification: NotificationConfig;
  readonly watchlist: {
    readonly onInvalid: WatchlistInvalidPolicy;
  };
  readonly search: SearchConfig;

  // Runtime overrides (from CLI flags)
  readonly verbose: boolean;
  readonly json: boolean;
  readonly dryRun: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

// ============================================================================
// Config File Schema
// ============================================================================

const FieldListSchema = z.array(z.string().min(1));

const ConfigFileSchema = z
  .object({
    version: z.number().int().optional(),
    paths: z
      .object({
        current: z.string().min(1).optional(),
        baseline: z.string().min(1).optional(),
        summary: z.string().min(1).optional(),
        watchlist: z.string().min(1).nullable().optional(),
      })
      .optional(),
    id_fields: FieldListSchema.optional(),
    compare_fields: FieldListSchema.nullable().optional(),
    ignore_fields: FieldListSchema.optional(),
    notification: z
      .object({
        send_when_no_changes: z.boolean().optional(),
        truncation_limit: z.number().int().optional(),
        title: z.string().optional(),
        footer: z.string().nullable().optional(),
      })
      .optional(),
    watchlist: z
      .object({
        on_invalid: z.enum(['fail', 'disable']).optional(),
      })
      .optional(),
    search: z
      .object({
        fields: FieldListSchema.optional(),
        limit: z.number().int().optional(),
      })
      .optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: Omit<ParcelWatchConfig, 'verbose' | 'json' | 'dryRun' | 'configPath'> = {
  version: 1,

  paths: {
    current: './data/parcels.geojson',
    baseline: './data/parcels_last.geojson',
    summary: './data/changes_summary.json',
    watchlist: './data/watched_parcels.txt',
  },

  idFields: DEFAULT_ID_FIELDS,

  diff: {
    compareFields: null,
    ignoreFields: [],
  },

  notification: {
    sendWhenNoChanges: false,
    truncationLimit: 10,
    title: 'Parcel change summary',
    footer: 'Changes reflect dataset updates, not verified ownership changes.',
  },

  watchlist: {
    onInvalid: 'fail',
  },

  search: {
    fields: ['PROP_STREET'],
    limit: 10,
  },
};

// ============================================================================
// Configuration Loading
// ============================================================================

/**
 * Standard config file names to search for
 */
const CONFIG_FILE_NAMES = [
  '.parcel-watchrc',
  '.parcel-watchrc.yaml',
  '.parcel-watchrc.yml',
  '.parcel-watchrc.json',
];

/**
 * Find config file in the start directory or its parents
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
 */
function parseConfigFile(filePath: string): ConfigFile {
  const content = readFileSync(filePath, 'utf-8');

  let raw: unknown;
  try {
    // YAML is a superset of JSON, so .json files parse here too
    raw = parseYaml(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError('Config file is not valid YAML/JSON', [reason], filePath);
  }

  const result = ConfigFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${formatIssuePath(issue.path)}: ${issue.message}`
    );
    throw new ConfigError('Config file failed validation', issues, filePath);
  }
  return result.data;
}

type Env = Readonly<Record<string, string | undefined>>;

function getEnvVar(env: Env, name: string): string | undefined {
  const value = env[`PARCEL_WATCH_${name}`];
  return value === undefined || value === '' ? undefined : value;
}

function getEnvBool(env: Env, name: string): boolean | undefined {
  const value = getEnvVar(env, name);
  if (value === undefined) return undefined;
  return value.toLowerCase() === 'true' || value === '1';
}

function getEnvNumber(env: Env, name: string): number | undefined {
  const value = getEnvVar(env, name);
  if (value === undefined) return undefined;
  const num = parseInt(value, 10);
  return isNaN(num) ? undefined : num;
}

function getEnvList(env: Env, name: string): string[] | undefined {
  const value = getEnvVar(env, name);
  if (value === undefined) return undefined;
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * CLI flag overrides
 */
export interface ConfigOverrides {
  readonly current?: string;
  readonly baseline?: string;
  readonly summary?: string;
  readonly watchlist?: string;
  readonly sendWhenNoChanges?: boolean;
  readonly truncationLimit?: number;
  readonly verbose?: boolean;
  readonly json?: boolean;
  readonly dryRun?: boolean;
}

export interface LoadConfigOptions {
  /** Explicit config file path */
  readonly configPath?: string;
  /** Directory to resolve relative paths and search for a config file (default: cwd) */
  readonly cwd?: string;
  /** Environment (default: process.env) */
  readonly env?: Env;
  readonly overrides?: ConfigOverrides;
}

/**
 * Load and merge configuration from all sources
 *
 * @throws ConfigError when the config file is missing, unparsable or invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): ParcelWatchConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const overrides = options.overrides ?? {};

  let configPath: string | null = null;
  let fileConfig: ConfigFile = {};

  if (options.configPath) {
    configPath = resolve(cwd, options.configPath);
    if (!existsSync(configPath)) {
      throw new ConfigError('Config file not found', [], configPath);
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    const envConfigPath = getEnvVar(env, 'CONFIG');
    if (envConfigPath) {
      configPath = resolve(cwd, envConfigPath);
      if (!existsSync(configPath)) {
        throw new ConfigError('Config file named by PARCEL_WATCH_CONFIG not found', [], configPath);
      }
      fileConfig = parseConfigFile(configPath);
    } else {
      configPath = findConfigFile(cwd);
      if (configPath) {
        fileConfig = parseConfigFile(configPath);
      }
    }
  }

  const fileBase = configPath ? dirname(configPath) : cwd;
  const fromRuntime = (value: string | undefined): string | undefined =>
    value === undefined ? undefined : resolve(cwd, value);
  const fromFile = (value: string | undefined): string | undefined =>
    value === undefined ? undefined : resolve(fileBase, value);

  const watchlistPath = (): string | null => {
    const runtime = fromRuntime(overrides.watchlist ?? getEnvVar(env, 'WATCHLIST'));
    if (runtime !== undefined) return runtime;
    if (fileConfig.paths?.watchlist === null) return null;
    return (
      fromFile(fileConfig.paths?.watchlist) ??
      (DEFAULT_CONFIG.paths.watchlist === null ? null : resolve(cwd, DEFAULT_CONFIG.paths.watchlist))
    );
  };

  const config: ParcelWatchConfig = {
    version: fileConfig.version ?? DEFAULT_CONFIG.version,

    paths: {
      current:
        fromRuntime(overrides.current ?? getEnvVar(env, 'CURRENT')) ??
        fromFile(fileConfig.paths?.current) ??
        resolve(cwd, DEFAULT_CONFIG.paths.current),
      baseline:
        fromRuntime(overrides.baseline ?? getEnvVar(env, 'BASELINE')) ??
        fromFile(fileConfig.paths?.baseline) ??
        resolve(cwd, DEFAULT_CONFIG.paths.baseline),
      summary:
        fromRuntime(overrides.summary ?? getEnvVar(env, 'SUMMARY')) ??
        fromFile(fileConfig.paths?.summary) ??
        resolve(cwd, DEFAULT_CONFIG.paths.summary),
      watchlist: watchlistPath(),
    },

    idFields: getEnvList(env, 'ID_FIELDS') ?? fileConfig.id_fields ?? DEFAULT_CONFIG.idFields,

    diff: {
      compareFields:
        fileConfig.compare_fields === undefined
          ? DEFAULT_CONFIG.diff.compareFields
          : fileConfig.compare_fields,
      ignoreFields:
        getEnvList(env, 'IGNORE_FIELDS') ??
        fileConfig.ignore_fields ??
        DEFAULT_CONFIG.diff.ignoreFields,
    },

    notification: {
      sendWhenNoChanges:
        overrides.sendWhenNoChanges ??
        getEnvBool(env, 'SEND_WHEN_NO_CHANGES') ??
        fileConfig.notification?.send_when_no_changes ??
        DEFAULT_CONFIG.notification.sendWhenNoChanges,
      truncationLimit:
        overrides.truncationLimit ??
        getEnvNumber(env, 'TRUNCATION_LIMIT') ??
        fileConfig.notification?.truncation_limit ??
        DEFAULT_CONFIG.notification.truncationLimit,
      title: fileConfig.notification?.title ?? DEFAULT_CONFIG.notification.title,
      footer:
        fileConfig.notification?.footer === undefined
          ? DEFAULT_CONFIG.notification.footer
          : fileConfig.notification.footer,
    },

    watchlist: {
      onInvalid: fileConfig.watchlist?.on_invalid ?? DEFAULT_CONFIG.watchlist.onInvalid,
    },

    search: {
      fields: fileConfig.search?.fields ?? DEFAULT_CONFIG.search.fields,
      limit: fileConfig.search?.limit ?? DEFAULT_CONFIG.search.limit,
    },

    // Runtime flags
    verbose: overrides.verbose ?? getEnvBool(env, 'VERBOSE') ?? false,
    json: overrides.json ?? getEnvBool(env, 'JSON') ?? false,
    dryRun: overrides.dryRun ?? getEnvBool(env, 'DRY_RUN') ?? false,
    configPath,
  };

  validateConfig(config);
  return config;
}

/**
 * Validate configuration ranges and cross-field rules
 *
 * @throws ConfigError listing every problem found
 */
export function validateConfig(config: ParcelWatchConfig): void {
  const issues: string[] = [];

  if (config.version !== 1) {
    issues.push(`version: unsupported config version ${config.version}, expected 1`);
  }

  if (config.idFields.length === 0) {
    issues.push('id_fields: at least one identifier field is required');
  }

  const limit = config.notification.truncationLimit;
  if (!Number.isInteger(limit) || limit < 1 || limit > 1000) {
    issues.push(`notification.truncation_limit: must be between 1 and 1000, got ${limit}`);
  }

  if (config.diff.compareFields !== null && config.diff.compareFields.length === 0) {
    issues.push('compare_fields: must list at least one field, or be omitted to compare all');
  }

  if (config.search.limit < 1) {
    issues.push(`search.limit: must be positive, got ${config.search.limit}`);
  }

  if (config.search.fields.length === 0) {
    issues.push('search.fields: at least one field is required');
  }

  const { current, baseline, summary } = config.paths;
  if (current === baseline) {
    issues.push('paths: current and baseline must be different files');
  }
  if (summary === current || summary === baseline) {
    issues.push('paths: summary must not overwrite a dataset file');
  }

  if (issues.length > 0) {
    throw new ConfigError('Invalid configuration', issues, config.configPath);
  }
}

/**
 * Snapshot loading options for the configured identifier fields
 */
export function snapshotOptionsFor(config: Pick<ParcelWatchConfig, 'idFields'>): SnapshotOptions {
  return { idResolution: createResolution('parcelId', config.idFields) };
}
