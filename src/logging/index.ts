import chalk from 'chalk';
import type { Logger, LoggerOptions, LogLevel } from './types';

function levelOf(options: LoggerOptions): LogLevel {
  if (options.quiet) return 'quiet';
  if (options.verbose) return 'verbose';
  return 'normal';
}

class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly useColors: boolean;

  constructor(options: LoggerOptions = {}) {
    this.level = levelOf(options);
    this.useColors = options.useColors !== false;
  }

  private paint(text: string, colorFn: (text: string) => string): string {
    return this.useColors ? colorFn(text) : text;
  }

  info(message: string): void {
    if (this.level === 'quiet') return;
    console.log(this.paint(message, chalk.blue));
  }

  // stderr: stdout carries command output
  warning(message: string): void {
    if (this.level === 'quiet') return;
    console.error(this.paint(`⚠️  ${message}`, chalk.yellow));
  }

  error(message: string): void {
    console.error(this.paint(`❌ ${message}`, chalk.red));
  }

  debug(message: string): void {
    if (this.level !== 'verbose') return;
    console.error(this.paint(`🔍 ${message}`, chalk.gray));
  }
}

let activeLogger: Logger = new ConsoleLogger();

/**
 * Installs the logger used by the module-level functions below. The CLI
 * sets one per invocation from `--verbose` and the command's quiet flag.
 */
export function setLogger(logger: Logger): void {
  activeLogger = logger;
}

export function resetLogger(): void {
  activeLogger = new ConsoleLogger();
}

export function info(message: string): void {
  activeLogger.info(message);
}

export function warning(message: string): void {
  activeLogger.warning(message);
}

export function error(message: string): void {
  activeLogger.error(message);
}

export function debug(message: string): void {
  activeLogger.debug(message);
}

export { ConsoleLogger };
export { FetchProgress } from './progress';
export type { Logger, LoggerOptions, LogLevel, ProgressOptions } from './types';
