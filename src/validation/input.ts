import { wrapValidationError } from '../errors';

const PROJECT_PATTERN = /^[a-z][a-z0-9-]*[a-z0-9]$/;
const IDENTIFIER_PATTERN = /^[a-zA-Z_][a-zA-Z0-9_]*$/;
const MAX_IDENTIFIER_LENGTH = 1024;

export interface ResourcePath {
  project: string;
  dataset: string;
  table?: string | undefined;
}

export interface TablePath {
  project: string;
  dataset: string;
  table: string;
}

export function validateProject(project: string): void {
  if (project === '') {
    throw new Error('project cannot be empty');
  }
  if (project.length < 6 || project.length > 30) {
    throw new Error(`project length must be 6-30 characters, got ${project.length}`);
  }
  if (!PROJECT_PATTERN.test(project)) {
    throw new Error(
      'project must start with lowercase letter, contain only lowercase letters, numbers, and hyphens, and end with letter or number'
    );
  }
}

function validateIdentifier(kind: 'dataset' | 'table', value: string): void {
  if (value === '') {
    throw new Error(`${kind} cannot be empty`);
  }
  if (value.length > MAX_IDENTIFIER_LENGTH) {
    throw new Error(
      `${kind} length cannot exceed ${MAX_IDENTIFIER_LENGTH} characters, got ${value.length}`
    );
  }
  if (!IDENTIFIER_PATTERN.test(value)) {
    throw new Error(
      `${kind} must start with letter or underscore, contain only letters, numbers, and underscores`
    );
  }
}

export function validateDataset(dataset: string): void {
  validateIdentifier('dataset', dataset);
}

export function validateTable(table: string): void {
  validateIdentifier('table', table);
}

function validateParts(parts: string[], input: string): void {
  if (parts.length < 2) {
    throw new Error(
      `invalid format: expected project.dataset or project.dataset.table, got ${input}`
    );
  }
  if (parts.length > 3) {
    throw new Error(`invalid format: too many parts in ${input}`);
  }

  const [project = '', dataset = '', table] = parts;
  const checks: Array<[string, () => void]> = [
    ['project', () => validateProject(project)],
    ['dataset', () => validateDataset(dataset)],
  ];
  if (table !== undefined) {
    checks.push(['table', () => validateTable(table)]);
  }

  for (const [label, check] of checks) {
    try {
      check();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new Error(`invalid ${label}: ${reason}`);
    }
  }
}

/**
 * Parses `project.dataset` or `project.dataset.table`.
 *
 * @throws a `validation` ClassifiedError describing the first problem found.
 */
export function parseResourcePath(input: string): ResourcePath {
  const parts = input.trim().split('.');
  try {
    validateParts(parts, input);
  } catch (error) {
    throw wrapValidationError(error, input);
  }

  const [project = '', dataset = '', table] = parts;
  return table === undefined ? { project, dataset } : { project, dataset, table };
}

export function parseTablePath(input: string): TablePath {
  const resource = parseResourcePath(input);
  if (resource.table === undefined) {
    throw wrapValidationError(
      new Error(`invalid table format: expected project.dataset.table, got ${input}`),
      input
    );
  }
  return { project: resource.project, dataset: resource.dataset, table: resource.table };
}
