import { z } from 'zod';

// bq renders int64 values as JSON strings. Counts past 2^53 would round, so they are rejected.
const int64 = z
  .union([z.string(), z.number()])
  .transform((value) => Number(value))
  .refine((value) => Number.isSafeInteger(value), {
    message: 'Expected an integer no larger than 2^53 - 1',
  });

export const TableReferenceSchema = z.object({
  projectId: z.string(),
  datasetId: z.string(),
  tableId: z.string(),
});

const tableFields = {
  tableId: z.string().optional(),
  tableReference: TableReferenceSchema,
  type: z.string().default('TABLE'),
  creationTime: int64.default(0),
  lastModifiedTime: int64.default(0),
  numRows: int64.default(0),
  numBytes: int64.default(0),
  location: z.string().optional(),
  friendlyName: z.string().optional(),
  description: z.string().optional(),
};

function withTableId<T extends { tableId?: string | undefined; tableReference: TableReference }>(
  table: T
): T & { tableId: string } {
  return { ...table, tableId: table.tableId || table.tableReference.tableId };
}

export interface SchemaField {
  name: string;
  type: string;
  mode?: string | undefined;
  description?: string | undefined;
  fields?: SchemaField[] | undefined;
}

export const SchemaFieldSchema: z.ZodType<SchemaField> = z.lazy(() =>
  z.object({
    name: z.string(),
    type: z.string(),
    mode: z.string().optional(),
    description: z.string().optional(),
    fields: z.array(SchemaFieldSchema).optional(),
  })
);

export const TableSchemaSchema = z.object({
  fields: z.array(SchemaFieldSchema),
});

export const TableInfoSchema = z.object(tableFields).transform(withTableId);

export const TableListSchema = z.array(TableInfoSchema);

export const TableMetadataSchema = z
  .object({
    ...tableFields,
    schema: TableSchemaSchema.optional(),
    view: z
      .object({
        query: z.string(),
        useLegacySql: z.boolean().optional(),
      })
      .optional(),
  })
  // unmodelled bq fields stay on the parsed value
  .passthrough()
  .transform(withTableId);

/** `bq show --schema` prints the bare field array. */
export const SchemaFieldListSchema = z.array(SchemaFieldSchema);

export const SchemaDocumentSchema = SchemaFieldListSchema.transform(
  (fields): TableSchema => ({ fields })
);

export type TableReference = z.infer<typeof TableReferenceSchema>;
export type TableInfo = z.infer<typeof TableInfoSchema>;
export type TableSchema = z.infer<typeof TableSchemaSchema>;
export type TableMetadata = z.infer<typeof TableMetadataSchema>;
