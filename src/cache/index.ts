import { mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { wrapCacheError } from '../errors';
import * as logger from '../logging';
import { CACHE_DB_FILE } from './location';
import { MemoryCacheStore } from './memory-store';
import { SqliteCacheStore } from './sqlite-store';
import type { CacheStorageKind, CacheStore } from './types';

export interface CacheStoreSettings {
  storage: CacheStorageKind;
  dir: string;
  defaultTtlMs: number;
}

export function openCacheStore(settings: CacheStoreSettings): CacheStore {
  if (settings.storage === 'memory') {
    return new MemoryCacheStore(settings.defaultTtlMs);
  }

  try {
    mkdirSync(settings.dir, { recursive: true, mode: 0o755 });
  } catch (error) {
    throw wrapCacheError(error, 'create directory');
  }

  return new SqliteCacheStore({
    path: join(settings.dir, CACHE_DB_FILE),
    defaultTtlMs: settings.defaultTtlMs,
  });
}

/**
 * Opens a store for the duration of `fn` and closes it on every exit path.
 */
export async function withCacheStore<T>(
  settings: CacheStoreSettings,
  fn: (store: CacheStore) => Promise<T>
): Promise<T> {
  const store = openCacheStore(settings);
  try {
    return await fn(store);
  } finally {
    try {
      store.close();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.warning(`Failed to close cache store: ${reason}`);
    }
  }
}

export { metadataKey, schemaKey, tableListKey } from './keys';
export { CACHE_DB_FILE, CACHE_DIR_ENV, resolveCacheDir } from './location';
export type { Environment } from './location';
export { MemoryCacheStore } from './memory-store';
export { SqliteCacheStore } from './sqlite-store';
export type { SqliteCacheStoreOptions } from './sqlite-store';
export { DEFAULT_CACHE_TTL, isValidTtl, resolveTtl } from './ttl';
export type {
  CacheEntry,
  CacheNamespace,
  CacheStats,
  CacheStorageKind,
  CacheStore,
  CacheTtlSettings,
} from './types';
