export {
  CONFIG_PATH_ENV,
  ConfigValidationError,
  cacheStoreSettings,
  loadConfig,
  parseConfigFile,
  readConfigFile,
} from './loader';
export { ConfigFileSchema } from './schema';
export type { ConfigFile } from './schema';
export type { AppConfig, BqSettings, CacheSettings, LoadConfigOptions } from './types';
