import chalk from 'chalk';
import ora from 'ora';
import { isClassifiedError } from '../errors';
import type { ProgressOptions } from './types';

function describeFailure(error: unknown): string {
  if (isClassifiedError(error)) {
    return error.message;
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Spinner shown while bq is running. Doubles as the retry status callback so
 * users see "retrying" feedback instead of a stalled terminal.
 */
export class FetchProgress {
  private spinner: ora.Ora | undefined;
  private readonly silent: boolean;
  private readonly enabled: boolean;

  constructor(options: ProgressOptions = {}) {
    this.silent = options.quiet ?? false;
    this.enabled = options.enabled ?? process.stderr.isTTY === true;
  }

  get active(): boolean {
    return this.spinner !== undefined;
  }

  start(text: string): void {
    if (this.silent) return;
    this.spinner = ora({ text, spinner: 'dots', isEnabled: this.enabled }).start();
  }

  retrying(attempt: number, previousError: unknown): void {
    if (!this.spinner) return;
    this.spinner.text = `${chalk.yellow(`Retrying (attempt ${attempt})`)} ${chalk.gray(
      describeFailure(previousError)
    )}`;
  }

  /**
   * Bound form of {@link retrying}, for `onRetry` options.
   */
  readonly onRetry = (attempt: number, previousError: unknown): void => {
    this.retrying(attempt, previousError);
  };

  succeed(text?: string): void {
    this.spinner?.succeed(text);
    this.spinner = undefined;
  }

  fail(text?: string): void {
    this.spinner?.fail(text);
    this.spinner = undefined;
  }

  stop(): void {
    this.spinner?.stop();
    this.spinner = undefined;
  }

  async track<T>(text: string, task: () => Promise<T>): Promise<T> {
    this.start(text);
    try {
      const result = await task();
      this.stop();
      return result;
    } catch (error) {
      this.fail();
      throw error;
    }
  }
}
