export type LogLevel = 'quiet' | 'normal' | 'verbose';

export interface LoggerOptions {
  verbose?: boolean;
  quiet?: boolean;
  useColors?: boolean;
}

/**
 * Sink for diagnostics. Command output goes to stdout directly, never
 * through a logger.
 */
export interface Logger {
  info(message: string): void;
  warning(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

export interface ProgressOptions {
  quiet?: boolean;
  /**
   * Render the spinner; defaults to whether stderr is a TTY.
   */
  enabled?: boolean;
}
