import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigValidationError, cacheStoreSettings, loadConfig, parseConfigFile } from '../loader';

function captureConfigError(fn: () => unknown): ConfigValidationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a ConfigValidationError');
}

describe('loadConfig', () => {
  let dir: string;

  const writeConfig = (name: string, content: string): string => {
    const path = join(dir, name);
    writeFileSync(path, content);
    return path;
  };

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'bqs-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('applies defaults without a config file', () => {
    const config = loadConfig({ env: { XDG_CACHE_HOME: '/xdg' } });

    expect(config).toEqual({
      cache: {
        enabled: true,
        storage: 'sqlite',
        dir: join('/xdg', 'bqs'),
        ttl: { default: 900_000, tables: 300_000, schema: 1_800_000, metadata: 900_000 },
      },
      bq: { path: 'bq', maxResults: 1000 },
      verbose: false,
      quiet: false,
      source: undefined,
    });
  });

  it('reads settings from the given file and converts TTLs to milliseconds', () => {
    const path = writeConfig(
      'bqs.yml',
      [
        'cache:',
        '  storage: memory',
        '  dir: cache',
        '  ttl:',
        '    tables: 60',
        '    default: 120',
        'bq:',
        '  path: /opt/bq',
        '  max_results: 50',
      ].join('\n')
    );

    const config = loadConfig({ configPath: path, env: {}, verbose: true });

    expect(config.cache).toEqual({
      enabled: true,
      storage: 'memory',
      dir: join(dir, 'cache'),
      ttl: { default: 120_000, tables: 60_000, schema: 1_800_000, metadata: 900_000 },
    });
    expect(config.bq).toEqual({ path: '/opt/bq', maxResults: 50 });
    expect(config.verbose).toBe(true);
    expect(config.source).toBe(path);
  });

  it('finds the config file through BQS_CONFIG', () => {
    const path = writeConfig('env.yml', 'cache:\n  enabled: false\n');

    const config = loadConfig({ env: { BQS_CONFIG: path, XDG_CACHE_HOME: '/xdg' } });

    expect(config.cache.enabled).toBe(false);
    expect(config.source).toBe(path);
  });

  it('lets BQS_CACHE_DIR override the configured directory', () => {
    const path = writeConfig('dir.yml', 'cache:\n  dir: /configured\n');

    const config = loadConfig({ configPath: path, env: { BQS_CACHE_DIR: '/override' } });

    expect(config.cache.dir).toBe('/override');
  });

  it('treats an empty file as all defaults', () => {
    const path = writeConfig('empty.yml', '');

    const config = loadConfig({ configPath: path, env: { XDG_CACHE_HOME: '/xdg' } });

    expect(config.cache.storage).toBe('sqlite');
    expect(config.bq.maxResults).toBe(1000);
  });

  it('reports a missing file', () => {
    const missing = join(dir, 'missing.yml');

    const error = captureConfigError(() => loadConfig({ configPath: missing, env: {} }));

    expect(error.message).toBe(`Configuration file not found: ${missing}`);
  });
});

describe('parseConfigFile', () => {
  it('rejects unknown keys', () => {
    const error = captureConfigError(() => parseConfigFile('extra: true\n'));

    expect(error.message).toBe('Configuration validation failed');
    expect(error.issues).toEqual(['root: Unrecognized key(s): extra']);
  });

  it('explains invalid enum values with field context', () => {
    const error = captureConfigError(() => parseConfigFile('cache:\n  storage: disk\n', 'bqs.yml'));

    expect(error.message).toBe('Configuration validation failed for bqs.yml');
    expect(error.issues).toEqual([
      "cache.storage: Invalid value. Expected one of: sqlite, memory\n    → Cache backend: 'sqlite' persists between runs, 'memory' lasts one command",
    ]);
  });

  it('explains type mismatches', () => {
    const error = captureConfigError(() => parseConfigFile('cache:\n  ttl:\n    tables: soon\n'));

    expect(error.issues).toEqual([
      'cache.ttl.tables: Expected number, but received string\n    → Cache lifetimes in seconds per namespace (default, tables, schema, metadata)',
    ]);
  });

  it('reports YAML syntax errors', () => {
    const error = captureConfigError(() => parseConfigFile('cache: [\n', 'broken.yml'));

    expect(error.message).toBe('Invalid YAML syntax in broken.yml');
    expect(error.issues).toHaveLength(1);
  });
});

describe('cacheStoreSettings', () => {
  it('selects the store from the cache settings', () => {
    const config = loadConfig({ env: { BQS_CACHE_DIR: '/cache' } });

    expect(cacheStoreSettings(config)).toEqual({
      storage: 'sqlite',
      dir: '/cache',
      defaultTtlMs: 900_000,
    });
  });
});
