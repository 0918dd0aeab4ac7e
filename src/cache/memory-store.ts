import { DEFAULT_CACHE_TTL, resolveTtl } from './ttl';
import type { CacheEntry, CacheStats, CacheStore } from './types';

function calculateSize(entry: CacheEntry): number {
  return Buffer.byteLength(entry.key, 'utf8') + Buffer.byteLength(entry.data, 'utf8');
}

function isLive(entry: CacheEntry, now: number): boolean {
  return entry.expiresAt.getTime() > now;
}

/**
 * In-process {@link CacheStore}. Entries do not outlive the process.
 */
export class MemoryCacheStore implements CacheStore {
  private readonly store = new Map<string, CacheEntry>();
  private readonly defaultTtlMs: number;
  private currentBytes = 0;

  constructor(defaultTtlMs: number = DEFAULT_CACHE_TTL.default) {
    this.defaultTtlMs = resolveTtl(defaultTtlMs, DEFAULT_CACHE_TTL.default);
  }

  get(key: string): CacheEntry | undefined {
    const entry = this.store.get(key);
    if (!entry || !isLive(entry, Date.now())) {
      return undefined;
    }
    return { ...entry };
  }

  set(key: string, data: string, ttlMs?: number, etag?: string): void {
    const now = Date.now();
    const ttl = resolveTtl(ttlMs, this.defaultTtlMs);
    const entry: CacheEntry = {
      key,
      data,
      createdAt: new Date(now),
      expiresAt: new Date(now + ttl),
    };
    if (etag !== undefined) {
      entry.etag = etag;
    }

    this.delete(key);
    this.store.set(key, entry);
    this.currentBytes += calculateSize(entry);
  }

  exists(key: string): boolean {
    const entry = this.store.get(key);
    return entry !== undefined && isLive(entry, Date.now());
  }

  delete(key: string): void {
    const existing = this.store.get(key);
    if (existing) {
      this.store.delete(key);
      this.currentBytes -= calculateSize(existing);
    }
  }

  clear(): void {
    this.store.clear();
    this.currentBytes = 0;
  }

  cleanup(): number {
    const now = Date.now();
    let removed = 0;
    for (const [key, entry] of [...this.store.entries()]) {
      if (!isLive(entry, now)) {
        this.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  stats(): CacheStats {
    const now = Date.now();
    let expired = 0;
    for (const entry of this.store.values()) {
      if (!isLive(entry, now)) {
        expired += 1;
      }
    }
    const total = this.store.size;
    return {
      totalEntries: total,
      validEntries: total - expired,
      expiredEntries: expired,
      sizeBytes: this.currentBytes,
    };
  }

  close(): void {
    this.clear();
  }
}
