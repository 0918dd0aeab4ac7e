export type ErrorKind =
  | 'network'
  | 'auth'
  | 'permission'
  | 'not_found'
  | 'quota'
  | 'external_tool'
  | 'cache'
  | 'validation'
  | 'unknown';

export const ERROR_KINDS: readonly ErrorKind[] = [
  'network',
  'auth',
  'permission',
  'not_found',
  'quota',
  'external_tool',
  'cache',
  'validation',
  'unknown',
];

export type BigQueryOperation = 'list_tables' | 'get_schema' | 'get_metadata';

export interface ErrorContext {
  operation?: string | undefined;
  project?: string | undefined;
  dataset?: string | undefined;
  table?: string | undefined;
  input?: string | undefined;
}

export interface OperationContext {
  operation: BigQueryOperation | string;
  project: string;
  dataset: string;
  table?: string | undefined;
}
