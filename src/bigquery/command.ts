import { execFile, spawn } from 'node:child_process';
import { CommandExitError } from '../errors';
import * as logger from '../logging';

/**
 * Runs the bq binary. Resolves with stdout; a non-zero exit rejects with a
 * {@link CommandExitError} carrying stderr.
 */
export interface BqRunner {
  run(args: string[], signal?: AbortSignal): Promise<string>;
}

export interface BqCommandOptions {
  /** Binary name or path. */
  binary?: string;
  maxBuffer?: number;
}

const DEFAULT_MAX_BUFFER = 64 * 1024 * 1024;

export class BqCommand implements BqRunner {
  readonly binary: string;
  private readonly maxBuffer: number;

  constructor(options: BqCommandOptions = {}) {
    this.binary = options.binary ?? 'bq';
    this.maxBuffer = options.maxBuffer ?? DEFAULT_MAX_BUFFER;
  }

  run(args: string[], signal?: AbortSignal): Promise<string> {
    logger.debug(`Running ${this.binary} ${args.join(' ')}`);

    return new Promise((resolve, reject) => {
      execFile(
        this.binary,
        args,
        { encoding: 'utf8', maxBuffer: this.maxBuffer, ...(signal && { signal }) },
        (error, stdout, stderr) => {
          if (!error) {
            resolve(stdout);
            return;
          }
          if (typeof error.code === 'number') {
            reject(new CommandExitError(this.binary, error.code, stderr));
            return;
          }
          reject(error);
        }
      );
    });
  }

  /**
   * Runs bq attached to this process's stdio and resolves with its exit code.
   */
  passthrough(args: string[]): Promise<number> {
    logger.debug(`Running ${this.binary} ${args.join(' ')}`);

    return new Promise((resolve, reject) => {
      const child = spawn(this.binary, args, { stdio: 'inherit' });
      child.once('error', reject);
      child.once('close', (code) => {
        resolve(code ?? 1);
      });
    });
  }
}

export function listTablesArgs(project: string, dataset: string, maxResults: number): string[] {
  return [
    'ls',
    `--project_id=${project}`,
    '--format=json',
    `--max_results=${maxResults}`,
    dataset,
  ];
}

export function showSchemaArgs(project: string, dataset: string, table: string): string[] {
  return ['show', `--project_id=${project}`, '--schema', '--format=json', `${dataset}.${table}`];
}

export function showTableArgs(project: string, dataset: string, table: string): string[] {
  return ['show', `--project_id=${project}`, '--format=json', `${dataset}.${table}`];
}
