#!/usr/bin/env node

import chalk from 'chalk';
import Table from 'cli-table3';
import { Command } from 'commander';
import {
  BigQueryClient,
  BqCommand,
  type BqRunner,
  flattenSchema,
  formatBytes,
  formatCount,
  formatTime,
  getTableTypeIcon,
  renderSchemaTree,
  type TableInfo,
} from './bigquery';
import { type CacheStoreSettings, withCacheStore } from './cache';
import { type AppConfig, ConfigValidationError, cacheStoreSettings, loadConfig } from './config';
import { isClassifiedError } from './errors';
import { ConsoleLogger, FetchProgress, setLogger } from './logging';
import * as logger from './logging';
import { parseResourcePath, parseTablePath } from './validation';

export const SHOW_FORMATS = ['json', 'prettyjson', 'pretty', 'sparse', 'csv'] as const;
export type ShowFormat = (typeof SHOW_FORMATS)[number];

/**
 * The bq binary as the CLI uses it: captured runs for cached fetches and
 * attached runs for everything the cache does not serve.
 */
export interface BqTool extends BqRunner {
  passthrough(args: string[]): Promise<number>;
}

type GlobalOptions = {
  config?: string;
  verbose?: boolean;
};

export interface ShowOptions {
  schema?: boolean;
  view?: boolean;
  materializedView?: boolean;
  format?: string;
  project?: string;
  quiet?: boolean;
  /** `false` when --no-cache is given. */
  cache?: boolean;
}

export interface BrowseOptions {
  detailed?: boolean;
}

function isShowFormat(value: string): value is ShowFormat {
  return SHOW_FORMATS.some((format) => format === value);
}

function reportError(error: unknown, verbose: boolean): number {
  if (isClassifiedError(error)) {
    logger.error(error.userFriendlyMessage());
  } else if (error instanceof ConfigValidationError) {
    logger.error(error.message);
    for (const issue of error.issues) {
      logger.error(`  ${issue}`);
    }
  } else if (error instanceof Error) {
    logger.error(error.message);
  } else {
    logger.error(String(error));
  }

  if (verbose && error instanceof Error && error.stack) {
    console.error(error.stack);
  }
  return 1;
}

async function guard(config: AppConfig, task: () => Promise<number>): Promise<number> {
  try {
    return await task();
  } catch (error) {
    return reportError(error, config.verbose);
  }
}

function defaultTool(config: AppConfig): BqTool {
  return new BqCommand({ binary: config.bq.path });
}

// A disabled cache still needs a store; an in-memory one lasts only this command.
function fetchStoreSettings(config: AppConfig): CacheStoreSettings {
  const settings = cacheStoreSettings(config);
  return config.cache.enabled ? settings : { ...settings, storage: 'memory' };
}

async function withClient<T>(
  config: AppConfig,
  tool: BqRunner,
  fn: (client: BigQueryClient) => Promise<T>
): Promise<T> {
  return withCacheStore(fetchStoreSettings(config), (store) =>
    fn(
      new BigQueryClient({
        cache: store,
        runner: tool,
        ttl: config.cache.ttl,
        maxResults: config.bq.maxResults,
      })
    )
  );
}

export function showPassthroughArgs(
  project: string,
  dataset: string,
  table: string,
  options: ShowOptions,
  format: ShowFormat
): string[] {
  const args = ['show', `--project_id=${project}`];
  if (options.schema) args.push('--schema');
  if (options.view) args.push('--view');
  if (options.materializedView) args.push('--materialized_view');
  args.push(`--format=${format}`);
  if (options.quiet) args.push('--quiet');
  args.push(`${dataset}.${table}`);
  return args;
}

function servedFromCache(options: ShowOptions, format: ShowFormat, config: AppConfig): boolean {
  return (
    (format === 'json' || format === 'prettyjson') &&
    !options.view &&
    !options.materializedView &&
    options.cache !== false &&
    config.cache.enabled
  );
}

function printJson(value: unknown, format: ShowFormat): void {
  console.log(format === 'prettyjson' ? JSON.stringify(value, null, 2) : JSON.stringify(value));
}

export async function runShow(
  target: string,
  options: ShowOptions,
  config: AppConfig,
  tool: BqTool = defaultTool(config)
): Promise<number> {
  return guard(config, async () => {
    const format = options.format ?? 'prettyjson';
    if (!isShowFormat(format)) {
      logger.error(`Invalid format '${format}'. Must be one of: ${SHOW_FORMATS.join(', ')}`);
      return 1;
    }

    const path = parseTablePath(target);
    const project = options.project || path.project;

    if (!servedFromCache(options, format, config)) {
      return tool.passthrough(showPassthroughArgs(project, path.dataset, path.table, options, format));
    }

    const progress = new FetchProgress({ quiet: config.quiet || options.quiet === true });
    const fullName = `${project}.${path.dataset}.${path.table}`;

    await withClient(config, tool, async (client) => {
      const fetchOptions = { onRetry: progress.onRetry };
      if (options.schema) {
        const fields = await progress.track(`Fetching schema for ${fullName}`, () =>
          client.getSchemaDocument(project, path.dataset, path.table, fetchOptions)
        );
        printJson(fields, format);
        return;
      }

      const metadata = await progress.track(`Fetching metadata for ${fullName}`, () =>
        client.getTableDocument(project, path.dataset, path.table, fetchOptions)
      );
      printJson(metadata, format);
    });
    return 0;
  });
}

async function browseTable(
  client: BigQueryClient,
  progress: FetchProgress,
  project: string,
  dataset: string,
  table: string
): Promise<void> {
  const metadata = await progress.track(`Fetching metadata for ${table}`, () =>
    client.getTableMetadata(project, dataset, table, { onRetry: progress.onRetry })
  );

  console.log(`📊 ${project}.${dataset}.${table} (${metadata.type})`);
  console.log(
    `📈 ${formatCount(metadata.numRows)} rows • 💾 ${formatBytes(metadata.numBytes)} • 🕒 Modified ${formatTime(metadata.lastModifiedTime)}\n`
  );

  if (metadata.schema) {
    console.log('🌲 Schema:');
    const colors = process.stdout.isTTY === true;
    for (const line of renderSchemaTree(flattenSchema(metadata.schema.fields), 'all', { colors })) {
      console.log(`  ${line}`);
    }
  }
}

async function detailedRow(
  client: BigQueryClient,
  project: string,
  dataset: string,
  table: TableInfo,
  cached: string
): Promise<string[]> {
  const icon = getTableTypeIcon(table.type);
  try {
    const metadata = await client.getTableMetadata(project, dataset, table.tableId);
    return [
      cached,
      icon,
      table.tableId,
      table.type,
      formatCount(metadata.numRows),
      formatBytes(metadata.numBytes),
      formatTime(metadata.lastModifiedTime),
    ];
  } catch (error) {
    logger.debug(
      `Metadata for ${table.tableId} unavailable: ${error instanceof Error ? error.message : String(error)}`
    );
    return [cached, icon, table.tableId, table.type, 'Error', 'Error', formatTime(table.creationTime)];
  }
}

async function browseDataset(
  client: BigQueryClient,
  progress: FetchProgress,
  project: string,
  dataset: string,
  detailed: boolean
): Promise<void> {
  const tables = await progress.track(`Listing tables in ${project}.${dataset}`, () =>
    client.listTables(project, dataset, { onRetry: progress.onRetry })
  );

  console.log(`📊 ${project}.${dataset}\n`);

  if (tables.length === 0) {
    console.log('No tables found in this dataset');
    return;
  }

  const head = detailed
    ? ['', '', 'Table', 'Type', 'Rows', 'Size', 'Modified']
    : ['', '', 'Table', 'Type', 'Created'];
  const output = new Table({
    head: head.map((h) => chalk.bold(h)),
    style: { head: [], border: [] },
  });

  if (detailed) {
    logger.info('🔄 Fetching detailed metadata for each table...');
  }

  for (const table of tables) {
    const cached = client.isTableMetadataCached(project, dataset, table.tableId) ? '⚡' : '';
    if (detailed) {
      output.push(await detailedRow(client, project, dataset, table, cached));
    } else {
      output.push([
        cached,
        getTableTypeIcon(table.type),
        table.tableId,
        table.type,
        formatTime(table.creationTime),
      ]);
    }
  }

  console.log(output.toString());

  if (detailed) {
    console.log(`\n💡 Detailed metadata fetched for ${tables.length} tables`);
  } else {
    console.log('\n💡 Use --detailed flag for size and row count information');
  }
  console.log(`Use 'bqs browse ${project}.${dataset}.TABLE_NAME' to explore specific tables`);
}

export async function runBrowse(
  target: string,
  options: BrowseOptions,
  config: AppConfig,
  tool: BqRunner = defaultTool(config)
): Promise<number> {
  return guard(config, async () => {
    const path = parseResourcePath(target);
    const progress = new FetchProgress({ quiet: config.quiet });

    await withClient(config, tool, (client) =>
      path.table
        ? browseTable(client, progress, path.project, path.dataset, path.table)
        : browseDataset(client, progress, path.project, path.dataset, options.detailed === true)
    );
    return 0;
  });
}

export async function runCacheStats(config: AppConfig): Promise<number> {
  return guard(config, () =>
    withCacheStore(cacheStoreSettings(config), async (store) => {
      const stats = store.stats();
      console.log('Cache Statistics:');
      console.log(`  Total entries:   ${stats.totalEntries}`);
      console.log(`  Valid entries:   ${stats.validEntries}`);
      console.log(`  Expired entries: ${stats.expiredEntries}`);
      console.log(`  Database size:   ${formatBytes(stats.sizeBytes)}`);
      if (stats.totalEntries > 0) {
        const hitRate = (stats.validEntries / stats.totalEntries) * 100;
        console.log(`  Hit rate:        ${hitRate.toFixed(1)}%`);
      }
      return 0;
    })
  );
}

export async function runCacheClear(config: AppConfig): Promise<number> {
  return guard(config, () =>
    withCacheStore(cacheStoreSettings(config), async (store) => {
      const { totalEntries } = store.stats();
      if (totalEntries === 0) {
        console.log('Cache is already empty');
        return 0;
      }
      store.clear();
      console.log(`Cleared ${totalEntries} cache entries`);
      return 0;
    })
  );
}

export async function runCacheCleanup(config: AppConfig): Promise<number> {
  return guard(config, () =>
    withCacheStore(cacheStoreSettings(config), async (store) => {
      const before = store.stats();
      const removed = store.cleanup();
      const after = store.stats();

      if (removed > 0) {
        console.log(`Removed ${removed} expired cache entries`);
        console.log(
          `Cache size reduced by ${formatBytes(Math.max(0, before.sizeBytes - after.sizeBytes))}`
        );
      } else {
        console.log('No expired entries to clean up');
      }
      return 0;
    })
  );
}

export async function runCacheInvalidate(
  target: string,
  config: AppConfig,
  tool: BqRunner = defaultTool(config)
): Promise<number> {
  return guard(config, async () => {
    const path = parseResourcePath(target);
    await withCacheStore(cacheStoreSettings(config), async (store) => {
      new BigQueryClient({ cache: store, runner: tool }).invalidateCache(
        path.project,
        path.dataset,
        path.table
      );
    });
    console.log(`Invalidated cached metadata for ${target}`);
    return 0;
  });
}

async function execute(
  command: Command,
  handler: (config: AppConfig) => Promise<number>,
  quiet = false
): Promise<void> {
  const globals = command.optsWithGlobals<GlobalOptions>();
  const verbose = globals.verbose === true;
  setLogger(new ConsoleLogger({ verbose, quiet }));

  try {
    const config = loadConfig({ configPath: globals.config, verbose, quiet });
    logger.debug(`Cache directory: ${config.cache.dir} (${config.cache.storage})`);
    process.exitCode = await handler(config);
  } catch (error) {
    process.exitCode = reportError(error, verbose);
  }
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('bqs')
    .description('📊 Inspect BigQuery tables and views through bq, with a local metadata cache')
    .version('1.0.0')
    .option('-c, --config <path>', 'Path to a YAML configuration file (or use BQS_CONFIG env)')
    .option('-v, --verbose', 'Enable verbose logging', false);

  program
    .command('show')
    .description('Show BigQuery table or view metadata')
    .argument('<project.dataset.table>', 'Fully qualified table or view')
    .option('-s, --schema', 'Show only the schema', false)
    .option('--view', 'Show view-specific details including SQL definition', false)
    .option('--materialized-view', 'Show materialized view details including refresh policies', false)
    .option('-f, --format <format>', `Output format: ${SHOW_FORMATS.join(', ')}`, 'prettyjson')
    .option('-p, --project <id>', 'Override project ID for cross-project access')
    .option('-q, --quiet', 'Suppress status updates', false)
    .option('--no-cache', 'Bypass cache and fetch fresh data')
    .action(async (target: string, options: ShowOptions, command: Command) => {
      await execute(command, (config) => runShow(target, options, config), options.quiet);
    });

  program
    .command('browse')
    .description('Browse the tables of a dataset, or the schema of one table')
    .argument('<project.dataset[.table]>', 'Dataset to list, or table to describe')
    .option(
      '-d, --detailed',
      'Fetch detailed metadata (size, rows) for each table - slower but complete',
      false
    )
    .action(async (target: string, options: BrowseOptions, command: Command) => {
      await execute(command, (config) => runBrowse(target, options, config));
    });

  const cache = program.command('cache').description('Manage the local BigQuery metadata cache');

  cache
    .command('stats')
    .description('Show cache statistics')
    .action(async (_options: unknown, command: Command) => {
      await execute(command, runCacheStats);
    });

  cache
    .command('clear')
    .description('Clear all cached data')
    .action(async (_options: unknown, command: Command) => {
      await execute(command, runCacheClear);
    });

  cache
    .command('cleanup')
    .description('Remove expired cache entries')
    .action(async (_options: unknown, command: Command) => {
      await execute(command, runCacheCleanup);
    });

  cache
    .command('invalidate')
    .description('Drop cached entries for a dataset or table')
    .argument('<project.dataset[.table]>', 'Dataset or table to invalidate')
    .action(async (target: string, _options: unknown, command: Command) => {
      await execute(command, (config) => runCacheInvalidate(target, config));
    });

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const program = buildProgram();

  if (argv.length < 3) {
    program.help();
  }

  await program.parseAsync(argv);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    process.exitCode = reportError(error, false);
  });
}
