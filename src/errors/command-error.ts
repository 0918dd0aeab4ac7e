import { cleanErrorOutput } from './clean';

/**
 * A subprocess that ran and exited with a non-zero status.
 */
export class CommandExitError extends Error {
  public readonly command: string;
  public readonly exitCode: number;
  public readonly stderr: string;

  constructor(command: string, exitCode: number, stderr: string) {
    const detail = stderr.trim() ? cleanErrorOutput(stderr) : '';
    super(`${command} exited with code ${exitCode}${detail ? `: ${detail}` : ''}`);
    this.name = 'CommandExitError';
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

export function isCommandExitError(error: unknown): error is CommandExitError {
  return (
    error instanceof Error &&
    'exitCode' in error &&
    typeof error.exitCode === 'number' &&
    'stderr' in error &&
    typeof error.stderr === 'string'
  );
}
