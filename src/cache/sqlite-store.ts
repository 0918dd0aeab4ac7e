import Database from 'better-sqlite3';
import { wrapCacheError } from '../errors';
import { DEFAULT_CACHE_TTL, resolveTtl } from './ttl';
import type { CacheEntry, CacheStats, CacheStore } from './types';

interface CacheRow {
  key: string;
  data: string;
  created_at: number;
  expires_at: number;
  etag: string | null;
}

interface CountRow {
  count: number;
}

export interface SqliteCacheStoreOptions {
  /** Database file, or `:memory:`. */
  path: string;
  defaultTtlMs?: number;
  /** Milliseconds to wait on a database locked by another process. */
  busyTimeoutMs?: number;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS metadata_cache (
    key TEXT PRIMARY KEY,
    data TEXT NOT NULL,
    created_at INTEGER NOT NULL,
    expires_at INTEGER NOT NULL,
    etag TEXT
  );

  CREATE INDEX IF NOT EXISTS idx_expires_at ON metadata_cache(expires_at);
  CREATE INDEX IF NOT EXISTS idx_created_at ON metadata_cache(created_at);
`;

// Timestamps are stored as unix seconds.
function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

function toEntry(row: CacheRow): CacheEntry {
  const entry: CacheEntry = {
    key: row.key,
    data: row.data,
    createdAt: new Date(row.created_at * 1000),
    expiresAt: new Date(row.expires_at * 1000),
  };
  if (row.etag) {
    entry.etag = row.etag;
  }
  return entry;
}

function openDatabase(path: string): Database.Database {
  try {
    return new Database(path);
  } catch (error) {
    throw wrapCacheError(error, 'open');
  }
}

/**
 * {@link CacheStore} persisted in a SQLite database. Every write is committed
 * before the call returns.
 */
export class SqliteCacheStore implements CacheStore {
  private readonly db: Database.Database;
  private readonly defaultTtlMs: number;
  private closed = false;

  constructor(options: SqliteCacheStoreOptions) {
    this.defaultTtlMs = resolveTtl(options.defaultTtlMs, DEFAULT_CACHE_TTL.default);

    this.db = openDatabase(options.path);

    try {
      this.db.pragma(`busy_timeout = ${options.busyTimeoutMs ?? 5_000}`);
      if (options.path !== ':memory:') {
        this.db.pragma('journal_mode = WAL');
      }
      this.db.exec(SCHEMA);
    } catch (error) {
      this.db.close();
      throw wrapCacheError(error, 'initialize schema');
    }
  }

  get(key: string): CacheEntry | undefined {
    return this.run('get', () => {
      const row = this.db
        .prepare<[string, number], CacheRow>(
          'SELECT key, data, created_at, expires_at, etag FROM metadata_cache WHERE key = ? AND expires_at > ?'
        )
        .get(key, nowSeconds());
      return row ? toEntry(row) : undefined;
    });
  }

  set(key: string, data: string, ttlMs?: number, etag?: string): void {
    const ttl = resolveTtl(ttlMs, this.defaultTtlMs);
    const createdAt = nowSeconds();
    // Sub-second TTLs still have to expire after the write second
    const expiresAt = Math.max(createdAt + 1, Math.floor((Date.now() + ttl) / 1000));

    this.run('set', () => {
      this.db
        .prepare<[string, string, number, number, string | null]>(
          'INSERT OR REPLACE INTO metadata_cache (key, data, created_at, expires_at, etag) VALUES (?, ?, ?, ?, ?)'
        )
        .run(key, data, createdAt, expiresAt, etag ?? null);
    });
  }

  exists(key: string): boolean {
    return this.run('exists', () => {
      const row = this.db
        .prepare<[string, number], { found: number }>(
          'SELECT 1 AS found FROM metadata_cache WHERE key = ? AND expires_at > ?'
        )
        .get(key, nowSeconds());
      return row !== undefined;
    });
  }

  delete(key: string): void {
    this.run('delete', () => {
      this.db.prepare<[string]>('DELETE FROM metadata_cache WHERE key = ?').run(key);
    });
  }

  clear(): void {
    this.run('clear', () => {
      this.db.prepare('DELETE FROM metadata_cache').run();
    });
  }

  cleanup(): number {
    return this.run('cleanup', () => {
      const result = this.db
        .prepare<[number]>('DELETE FROM metadata_cache WHERE expires_at <= ?')
        .run(nowSeconds());
      if (result.changes > 0) {
        this.db.exec('VACUUM');
      }
      return result.changes;
    });
  }

  stats(): CacheStats {
    return this.run('stats', () => {
      const collect = this.db.transaction((now: number): CacheStats => {
        const total =
          this.db
            .prepare<[], CountRow>('SELECT COUNT(*) AS count FROM metadata_cache')
            .get()?.count ?? 0;
        const expired =
          this.db
            .prepare<[number], CountRow>(
              'SELECT COUNT(*) AS count FROM metadata_cache WHERE expires_at <= ?'
            )
            .get(now)?.count ?? 0;
        const pageCount = Number(this.db.pragma('page_count', { simple: true }));
        const pageSize = Number(this.db.pragma('page_size', { simple: true }));

        return {
          totalEntries: total,
          validEntries: total - expired,
          expiredEntries: expired,
          sizeBytes: pageCount * pageSize,
        };
      });
      return collect(nowSeconds());
    });
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.db.close();
  }

  private run<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      throw wrapCacheError(error, operation);
    }
  }
}
