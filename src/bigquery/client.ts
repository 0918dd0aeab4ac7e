import type { z } from 'zod';
import {
  type CacheNamespace,
  type CacheStore,
  type CacheTtlSettings,
  DEFAULT_CACHE_TTL,
  metadataKey,
  schemaKey,
  tableListKey,
} from '../cache';
import {
  type BigQueryOperation,
  type ClassifiedError,
  classifyBigQueryError,
  isClassifiedError,
  wrapCacheError,
} from '../errors';
import * as logger from '../logging';
import {
  DEFAULT_RETRY_CONFIG,
  QUICK_RETRY_CONFIG,
  type RetryConfig,
  type RetryStatusCallback,
  withRetry,
} from '../retry';
import { type BqRunner, listTablesArgs, showSchemaArgs, showTableArgs } from './command';
import {
  SchemaDocumentSchema,
  type TableInfo,
  TableListSchema,
  type TableMetadata,
  TableMetadataSchema,
  type TableSchema,
} from './types';

export const DEFAULT_MAX_RESULTS = 1000;

export interface BigQueryClientOptions {
  cache: CacheStore;
  runner: BqRunner;
  ttl?: Partial<CacheTtlSettings>;
  maxResults?: number;
}

export interface FetchOptions {
  signal?: AbortSignal | undefined;
  onRetry?: RetryStatusCallback | undefined;
}

interface FetchPlan<T> {
  key: string;
  namespace: CacheNamespace;
  operation: BigQueryOperation;
  project: string;
  dataset: string;
  table?: string;
  retry: RetryConfig;
  /** Validates the bq document and derives the typed value from it. */
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  /** Runs bq and returns its JSON document as printed. */
  load: (signal?: AbortSignal) => Promise<unknown>;
}

/**
 * A fetch result: the typed value and the bq document it was parsed from.
 * The cache holds the document, so `show` can print it unchanged.
 */
interface Fetched<T> {
  value: T;
  document: unknown;
}

function parseJson(raw: string): unknown {
  return JSON.parse(raw);
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function asCacheError(error: unknown, operation: string): ClassifiedError {
  return isClassifiedError(error) ? error : wrapCacheError(error, operation);
}

/**
 * Table metadata through bq, served from the cache store while entries are
 * fresh. Fetch failures surface as classified errors only.
 */
export class BigQueryClient {
  private readonly cache: CacheStore;
  private readonly runner: BqRunner;
  private readonly ttl: CacheTtlSettings;
  private readonly maxResults: number;

  constructor(options: BigQueryClientOptions) {
    this.cache = options.cache;
    this.runner = options.runner;
    this.ttl = { ...DEFAULT_CACHE_TTL, ...options.ttl };
    this.maxResults = options.maxResults ?? DEFAULT_MAX_RESULTS;
  }

  /**
   * List tables in a dataset. Uses the quick retry policy since a user is
   * usually waiting on the listing.
   */
  async listTables(project: string, dataset: string, options?: FetchOptions): Promise<TableInfo[]> {
    const { value } = await this.fetchWithCache(
      {
        key: tableListKey(project, dataset),
        namespace: 'tables',
        operation: 'list_tables',
        project,
        dataset,
        retry: QUICK_RETRY_CONFIG,
        schema: TableListSchema,
        load: async (signal) => {
          const output = await this.runner.run(
            listTablesArgs(project, dataset, this.maxResults),
            signal
          );
          // bq ls prints nothing for an empty dataset
          return output.trim() ? parseJson(output) : [];
        },
      },
      options
    );
    return value;
  }

  async getSchema(
    project: string,
    dataset: string,
    table: string,
    options?: FetchOptions
  ): Promise<TableSchema> {
    const { value } = await this.fetchSchema(project, dataset, table, options);
    return value;
  }

  /**
   * The field array exactly as `bq show --schema` prints it.
   */
  async getSchemaDocument(
    project: string,
    dataset: string,
    table: string,
    options?: FetchOptions
  ): Promise<unknown> {
    const { document } = await this.fetchSchema(project, dataset, table, options);
    return document;
  }

  async getTableMetadata(
    project: string,
    dataset: string,
    table: string,
    options?: FetchOptions
  ): Promise<TableMetadata> {
    const { value } = await this.fetchMetadata(project, dataset, table, options);
    return value;
  }

  /**
   * The table resource exactly as `bq show` prints it, int64 strings and
   * unmodelled fields included.
   */
  async getTableDocument(
    project: string,
    dataset: string,
    table: string,
    options?: FetchOptions
  ): Promise<unknown> {
    const { document } = await this.fetchMetadata(project, dataset, table, options);
    return document;
  }

  /**
   * Whether metadata for the table is cached, without fetching it.
   */
  isTableMetadataCached(project: string, dataset: string, table: string): boolean {
    try {
      return this.cache.exists(metadataKey(project, dataset, table));
    } catch (error) {
      logger.debug(`Cache lookup failed: ${messageOf(error)}`);
      return false;
    }
  }

  /**
   * Drops the schema and metadata entries of `table` and the table list of
   * `dataset`.
   */
  invalidateCache(project: string, dataset?: string, table?: string): void {
    const keys: string[] = [];

    if (dataset && table) {
      keys.push(schemaKey(project, dataset, table), metadataKey(project, dataset, table));
    }

    if (dataset) {
      keys.push(tableListKey(project, dataset));
    }

    for (const key of keys) {
      try {
        this.cache.delete(key);
      } catch (error) {
        throw asCacheError(error, `invalidate ${key}`);
      }
    }
  }

  private fetchSchema(
    project: string,
    dataset: string,
    table: string,
    options?: FetchOptions
  ): Promise<Fetched<TableSchema>> {
    return this.fetchWithCache(
      {
        key: schemaKey(project, dataset, table),
        namespace: 'schema',
        operation: 'get_schema',
        project,
        dataset,
        table,
        retry: DEFAULT_RETRY_CONFIG,
        schema: SchemaDocumentSchema,
        load: async (signal) =>
          parseJson(await this.runner.run(showSchemaArgs(project, dataset, table), signal)),
      },
      options
    );
  }

  private fetchMetadata(
    project: string,
    dataset: string,
    table: string,
    options?: FetchOptions
  ): Promise<Fetched<TableMetadata>> {
    return this.fetchWithCache(
      {
        key: metadataKey(project, dataset, table),
        namespace: 'metadata',
        operation: 'get_metadata',
        project,
        dataset,
        table,
        retry: DEFAULT_RETRY_CONFIG,
        schema: TableMetadataSchema,
        load: async (signal) =>
          parseJson(await this.runner.run(showTableArgs(project, dataset, table), signal)),
      },
      options
    );
  }

  private readCached<T>(
    key: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Fetched<T> | undefined {
    let raw: string | undefined;
    try {
      raw = this.cache.get(key)?.data;
    } catch (error) {
      logger.debug(`Cache read for ${key} failed: ${messageOf(error)}`);
      return undefined;
    }

    if (raw === undefined) {
      return undefined;
    }

    let document: unknown;
    try {
      document = parseJson(raw);
    } catch {
      logger.debug(`Ignoring cached ${key}: payload is not valid JSON`);
      return undefined;
    }

    const parsed = schema.safeParse(document);
    if (!parsed.success) {
      logger.debug(`Ignoring cached ${key}: payload does not match the expected shape`);
      return undefined;
    }
    return { value: parsed.data, document };
  }

  private writeCached(key: string, document: unknown, ttlMs: number): void {
    let data: string;
    try {
      data = JSON.stringify(document);
    } catch (error) {
      logger.warning(wrapCacheError(error, `serialize ${key}`).userFriendlyMessage());
      return;
    }

    try {
      this.cache.set(key, data, ttlMs);
    } catch (error) {
      logger.warning(asCacheError(error, `write ${key}`).userFriendlyMessage());
    }
  }

  private async fetchWithCache<T>(
    plan: FetchPlan<T>,
    options: FetchOptions = {}
  ): Promise<Fetched<T>> {
    const cached = this.readCached(plan.key, plan.schema);
    if (cached !== undefined) {
      logger.debug(`Cache hit for ${plan.key}`);
      return cached;
    }

    logger.debug(`Cache miss for ${plan.key}`);
    const context = {
      operation: plan.operation,
      project: plan.project,
      dataset: plan.dataset,
      table: plan.table,
    };

    const fetched = await withRetry(
      plan.operation,
      async (): Promise<Fetched<T>> => {
        try {
          const document = await plan.load(options.signal);
          return { value: plan.schema.parse(document), document };
        } catch (error) {
          if (options.signal?.aborted) {
            throw error;
          }
          throw classifyBigQueryError(error, context);
        }
      },
      plan.retry,
      { signal: options.signal, onRetry: options.onRetry }
    );

    this.writeCached(plan.key, fetched.document, this.ttl[plan.namespace]);
    return fetched;
  }
}
