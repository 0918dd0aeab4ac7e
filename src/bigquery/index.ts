export { BigQueryClient, DEFAULT_MAX_RESULTS } from './client';
export type { BigQueryClientOptions, FetchOptions } from './client';
export { BqCommand, listTablesArgs, showSchemaArgs, showTableArgs } from './command';
export type { BqCommandOptions, BqRunner } from './command';
export { formatBytes, formatCount, formatTime, getTableTypeIcon } from './format';
export { flattenSchema, renderSchemaTree } from './schema-tree';
export type { ExpandedPaths, RenderOptions, SchemaNode } from './schema-tree';
export {
  SchemaDocumentSchema,
  SchemaFieldListSchema,
  SchemaFieldSchema,
  TableInfoSchema,
  TableListSchema,
  TableMetadataSchema,
  TableReferenceSchema,
  TableSchemaSchema,
} from './types';
export type { SchemaField, TableInfo, TableMetadata, TableReference, TableSchema } from './types';
