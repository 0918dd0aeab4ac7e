import { homedir } from 'node:os';
import { join } from 'node:path';

export const CACHE_DIR_ENV = 'BQS_CACHE_DIR';
export const CACHE_DB_FILE = 'metadata.db';

export type Environment = Record<string, string | undefined>;

/**
 * Cache directory, in priority order: `BQS_CACHE_DIR`, the configured
 * directory, `$XDG_CACHE_HOME/bqs`, then `~/.cache/bqs`.
 */
export function resolveCacheDir(
  env: Environment = process.env,
  configuredDir?: string,
  home: () => string = homedir
): string {
  const override = env[CACHE_DIR_ENV];
  if (override) {
    return override;
  }

  if (configuredDir) {
    return configuredDir;
  }

  const xdgCache = env.XDG_CACHE_HOME;
  if (xdgCache) {
    return join(xdgCache, 'bqs');
  }

  return join(home(), '.cache', 'bqs');
}
