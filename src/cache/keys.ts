// Key formats are shared with existing cache files and must not change.

export function tableListKey(project: string, dataset: string): string {
  return `tables:${project}.${dataset}`;
}

export function schemaKey(project: string, dataset: string, table: string): string {
  return `schema:${project}.${dataset}.${table}`;
}

export function metadataKey(project: string, dataset: string, table: string): string {
  return `metadata:${project}.${dataset}.${table}`;
}
