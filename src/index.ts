export * from './bigquery';
export * from './cache';
export * from './config';
export * from './errors';
export * from './retry';
export * from './validation';
export { ConsoleLogger, FetchProgress, resetLogger, setLogger } from './logging';
export type { Logger, LoggerOptions, ProgressOptions } from './logging';
