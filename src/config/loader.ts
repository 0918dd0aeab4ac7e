import * as fs from 'node:fs';
import * as path from 'node:path';
import * as yaml from 'js-yaml';
import { type ZodIssue, ZodError } from 'zod';
import { type CacheStoreSettings, DEFAULT_CACHE_TTL, resolveCacheDir, resolveTtl } from '../cache';
import { type ConfigFile, ConfigFileSchema } from './schema';
import type { AppConfig, LoadConfigOptions } from './types';

export const CONFIG_PATH_ENV = 'BQS_CONFIG';

export class ConfigValidationError extends Error {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}

const FIELD_CONTEXT: Record<string, string> = {
  'cache.ttl': 'Cache lifetimes in seconds per namespace (default, tables, schema, metadata)',
  'cache.storage': "Cache backend: 'sqlite' persists between runs, 'memory' lasts one command",
  'cache.dir': 'Directory holding metadata.db; BQS_CACHE_DIR takes precedence',
  'bq.max_results': 'Upper bound passed to bq ls --max_results',
  'bq.path': 'Path or name of the bq executable',
};

function fieldContext(issuePath: string): string {
  for (const [key, description] of Object.entries(FIELD_CONTEXT)) {
    if (issuePath.startsWith(key)) {
      return description;
    }
  }
  return '';
}

function describeIssue(issue: ZodIssue): string {
  const issuePath = issue.path.length > 0 ? issue.path.join('.') : 'root';
  let message = issue.message;

  if (issue.code === 'invalid_type') {
    message = `Expected ${issue.expected}, but received ${issue.received}`;
  } else if (issue.code === 'invalid_enum_value') {
    message = `Invalid value. Expected one of: ${issue.options.join(', ')}`;
  } else if (issue.code === 'unrecognized_keys') {
    message = `Unrecognized key(s): ${issue.keys.join(', ')}`;
  }

  const context = fieldContext(issuePath);
  return context ? `${issuePath}: ${message}\n    → ${context}` : `${issuePath}: ${message}`;
}

/**
 * Parses and validates config file contents. An empty document is treated as
 * an empty mapping so every default applies.
 */
export function parseConfigFile(yamlContent: string, sourcePath?: string): ConfigFile {
  const where = sourcePath ? ` in ${sourcePath}` : '';

  let parsed: unknown;
  try {
    parsed = yaml.load(yamlContent);
  } catch (error) {
    throw new ConfigValidationError(`Invalid YAML syntax${where}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  try {
    return ConfigFileSchema.parse(parsed ?? {});
  } catch (error) {
    if (error instanceof ZodError) {
      const target = sourcePath ? ` for ${sourcePath}` : '';
      throw new ConfigValidationError(
        `Configuration validation failed${target}`,
        error.issues.map(describeIssue)
      );
    }
    throw error;
  }
}

export function readConfigFile(configPath: string): ConfigFile {
  if (!fs.existsSync(configPath)) {
    throw new ConfigValidationError(`Configuration file not found: ${configPath}`);
  }
  return parseConfigFile(fs.readFileSync(configPath, 'utf8'), configPath);
}

const SECOND = 1000;

function toMs(seconds: number | undefined): number | undefined {
  return seconds === undefined ? undefined : seconds * SECOND;
}

/**
 * Builds the settings for one invocation. The config file comes from
 * `configPath`, then `BQS_CONFIG`; without either, defaults apply.
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? env[CONFIG_PATH_ENV];
  const file = configPath ? readConfigFile(configPath) : ConfigFileSchema.parse({});

  const ttl: NonNullable<ConfigFile['cache']['ttl']> = file.cache.ttl ?? {};
  const configuredDir =
    file.cache.dir && configPath
      ? path.resolve(path.dirname(configPath), file.cache.dir)
      : undefined;
  const defaultTtl = resolveTtl(toMs(ttl.default), DEFAULT_CACHE_TTL.default);

  return {
    cache: {
      enabled: file.cache.enabled,
      storage: file.cache.storage,
      dir: resolveCacheDir(env, configuredDir),
      ttl: {
        default: defaultTtl,
        tables: resolveTtl(toMs(ttl.tables), DEFAULT_CACHE_TTL.tables),
        schema: resolveTtl(toMs(ttl.schema), DEFAULT_CACHE_TTL.schema),
        metadata: resolveTtl(toMs(ttl.metadata), DEFAULT_CACHE_TTL.metadata),
      },
    },
    bq: {
      path: file.bq.path,
      maxResults: file.bq.max_results,
    },
    verbose: options.verbose ?? false,
    quiet: options.quiet ?? false,
    source: configPath,
  };
}

export function cacheStoreSettings(config: AppConfig): CacheStoreSettings {
  return {
    storage: config.cache.storage,
    dir: config.cache.dir,
    defaultTtlMs: config.cache.ttl.default,
  };
}
