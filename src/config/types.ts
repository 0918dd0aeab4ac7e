import type { CacheStorageKind, CacheTtlSettings, Environment } from '../cache';

export interface CacheSettings {
  enabled: boolean;
  storage: CacheStorageKind;
  dir: string;
  /** Milliseconds per namespace. */
  ttl: CacheTtlSettings;
}

export interface BqSettings {
  path: string;
  maxResults: number;
}

/**
 * Settings for one CLI invocation. Built once by `loadConfig` and passed down
 * to command handlers.
 */
export interface AppConfig {
  cache: CacheSettings;
  bq: BqSettings;
  verbose: boolean;
  quiet: boolean;
  /** Config file the settings were read from, if any. */
  source?: string | undefined;
}

export interface LoadConfigOptions {
  configPath?: string | undefined;
  env?: Environment;
  verbose?: boolean | undefined;
  quiet?: boolean | undefined;
}
