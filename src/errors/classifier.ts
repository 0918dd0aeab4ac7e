import { ClassifiedError } from './classified-error';
import { cleanErrorOutput } from './clean';
import { isCommandExitError } from './command-error';
import type { ErrorContext, OperationContext } from './types';

function errorText(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// An exit error's message names the binary, whose path may contain any word.
function diagnosticText(error: unknown): string {
  return isCommandExitError(error) ? error.stderr : errorText(error);
}

function containsAny(haystack: string, needles: string[]): boolean {
  return needles.some((needle) => haystack.includes(needle));
}

function notFoundMessage({ operation, project, dataset, table }: OperationContext): string {
  if (operation === 'list_tables') {
    return `Dataset ${project}.${dataset} not found or empty`;
  }
  if (table) {
    return `Table ${project}.${dataset}.${table} not found`;
  }
  return `Dataset ${project}.${dataset} not found`;
}

function toErrorContext(context: OperationContext): ErrorContext {
  const result: ErrorContext = {
    operation: context.operation,
    project: context.project,
    dataset: context.dataset,
  };
  if (context.table) {
    result.table = context.table;
  }
  return result;
}

/**
 * Maps a failed bq invocation onto the error taxonomy. Rules are checked in
 * order and the first match wins.
 */
export function classifyBigQueryError(error: unknown, context: OperationContext): ClassifiedError {
  const text = diagnosticText(error);
  const lower = text.toLowerCase();
  const errorContext = toErrorContext(context);
  const { project, dataset } = context;

  if (lower.includes('not found')) {
    return new ClassifiedError({
      kind: 'not_found',
      message: notFoundMessage(context),
      retryable: false,
      underlying: error,
      context: errorContext,
    });
  }

  if (containsAny(lower, ['permission denied', 'access denied'])) {
    return new ClassifiedError({
      kind: 'permission',
      message: `Access denied to ${project}.${dataset} - check BigQuery permissions`,
      retryable: false,
      underlying: error,
      context: errorContext,
    });
  }

  if (containsAny(lower, ['authentication', 'credentials'])) {
    return new ClassifiedError({
      kind: 'auth',
      message:
        "Authentication failed - run 'gcloud auth login' or check service account credentials",
      retryable: false,
      underlying: error,
      context: errorContext,
    });
  }

  if (containsAny(lower, ['quota', 'rate limit'])) {
    return new ClassifiedError({
      kind: 'quota',
      message: 'BigQuery quota exceeded - retrying with backoff',
      retryable: true,
      retryAfterMs: 30_000,
      underlying: error,
      context: errorContext,
    });
  }

  if (containsAny(lower, ['timeout', 'deadline'])) {
    return new ClassifiedError({
      kind: 'network',
      message: 'BigQuery request timed out - retrying',
      retryable: true,
      retryAfterMs: 5_000,
      underlying: error,
      context: errorContext,
    });
  }

  if (containsAny(lower, ['connection', 'network'])) {
    return new ClassifiedError({
      kind: 'network',
      message: 'Network error connecting to BigQuery - retrying',
      retryable: true,
      retryAfterMs: 2_000,
      underlying: error,
      context: errorContext,
    });
  }

  if (isCommandExitError(error)) {
    return new ClassifiedError({
      kind: 'external_tool',
      message: cleanErrorOutput(error.stderr) || error.message,
      retryable: true,
      underlying: error,
      context: errorContext,
    });
  }

  return new ClassifiedError({
    kind: 'unknown',
    message: cleanErrorOutput(text) || 'BigQuery operation failed',
    retryable: true,
    underlying: error,
    context: errorContext,
  });
}

export function wrapCacheError(error: unknown, operation: string): ClassifiedError {
  return new ClassifiedError({
    kind: 'cache',
    message: `Cache ${operation} failed: ${errorText(error)}`,
    retryable: false,
    underlying: error,
    context: { operation },
  });
}

export function wrapValidationError(error: unknown, input: string): ClassifiedError {
  return new ClassifiedError({
    kind: 'validation',
    message: `Invalid input '${input}': ${errorText(error)}`,
    retryable: false,
    underlying: error,
    context: { input },
  });
}
