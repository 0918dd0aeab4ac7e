import { ERROR_KINDS, type ErrorContext, type ErrorKind } from './types';

const DEFAULT_RETRY_AFTER_MS: Partial<Record<ErrorKind, number>> = {
  network: 2_000,
  quota: 30_000,
  external_tool: 5_000,
};

const FALLBACK_RETRY_AFTER_MS = 1_000;

const FRIENDLY_SUFFIXES: Partial<Record<ErrorKind, string>> = {
  not_found: 'verify the project, dataset, and table names',
  permission: 'contact your administrator',
  quota: 'try again in a few moments',
  network: 'check your internet connection',
  validation: 'use format: project.dataset[.table]',
};

export interface ClassifiedErrorOptions {
  kind: ErrorKind;
  message: string;
  retryable: boolean;
  underlying?: unknown;
  retryAfterMs?: number | undefined;
  context?: ErrorContext;
}

/**
 * An error tagged with a taxonomy kind, retryability and a backoff hint.
 *
 * Callers dispatch on `kind`; {@link isClassifiedError} narrows unknown values.
 */
export class ClassifiedError extends Error {
  public readonly kind: ErrorKind;
  public readonly retryable: boolean;
  public readonly underlying: unknown;
  public readonly context: ErrorContext;
  private readonly explicitRetryAfterMs: number | undefined;

  constructor(options: ClassifiedErrorOptions) {
    super(options.message);
    this.name = 'ClassifiedError';
    this.kind = options.kind;
    this.retryable = options.retryable;
    this.underlying = options.underlying;
    this.context = options.context ?? {};
    this.explicitRetryAfterMs = options.retryAfterMs;
  }

  /**
   * Backoff before the next attempt: the value set at classification time, or
   * the default for this kind.
   */
  get retryAfterMs(): number {
    if (this.explicitRetryAfterMs !== undefined && this.explicitRetryAfterMs > 0) {
      return this.explicitRetryAfterMs;
    }
    return DEFAULT_RETRY_AFTER_MS[this.kind] ?? FALLBACK_RETRY_AFTER_MS;
  }

  annotateAttempts(attempts: number): void {
    this.message = `${this.message} (failed after ${attempts} attempts)`;
  }

  userFriendlyMessage(): string {
    const suffix = FRIENDLY_SUFFIXES[this.kind];
    return suffix ? `${this.message} - ${suffix}` : this.message;
  }

  /**
   * Message followed by the non-empty context fields, for verbose output.
   */
  describe(): string {
    const parts = Object.entries(this.context)
      .filter(([, value]) => typeof value === 'string' && value.length > 0)
      .map(([key, value]) => `${key}=${value}`);
    return parts.length > 0 ? `${this.message} (${parts.join(', ')})` : this.message;
  }
}

export function isErrorKind(value: unknown): value is ErrorKind {
  return typeof value === 'string' && ERROR_KINDS.some((kind) => kind === value);
}

export function isClassifiedError(error: unknown): error is ClassifiedError {
  return (
    error instanceof Error &&
    'kind' in error &&
    isErrorKind(error.kind) &&
    'retryable' in error &&
    typeof error.retryable === 'boolean'
  );
}
