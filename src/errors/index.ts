export { ClassifiedError, isClassifiedError, isErrorKind } from './classified-error';
export type { ClassifiedErrorOptions } from './classified-error';
export { classifyBigQueryError, wrapCacheError, wrapValidationError } from './classifier';
export { cleanErrorOutput } from './clean';
export { CommandExitError, isCommandExitError } from './command-error';
export { ERROR_KINDS } from './types';
export type { BigQueryOperation, ErrorContext, ErrorKind, OperationContext } from './types';
