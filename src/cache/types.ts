export type CacheNamespace = 'tables' | 'schema' | 'metadata';

export type CacheStorageKind = 'sqlite' | 'memory';

export interface CacheEntry {
  key: string;
  data: string;
  createdAt: Date;
  expiresAt: Date;
  etag?: string | undefined;
}

export interface CacheStats {
  totalEntries: number;
  validEntries: number;
  expiredEntries: number;
  sizeBytes: number;
}

/**
 * Durable, namespaced, expiring key-value storage.
 *
 * `get` and `exists` only see entries whose expiry lies in the future; an
 * `undefined` result from `get` is a cache miss, not a failure. Store failures
 * are thrown as `cache` classified errors.
 */
export interface CacheStore {
  get(key: string): CacheEntry | undefined;
  set(key: string, data: string, ttlMs?: number, etag?: string): void;
  exists(key: string): boolean;
  delete(key: string): void;
  clear(): void;
  /** Removes expired entries and returns how many were removed. */
  cleanup(): number;
  stats(): CacheStats;
  close(): void;
}

export interface CacheTtlSettings {
  default: number;
  tables: number;
  schema: number;
  metadata: number;
}
