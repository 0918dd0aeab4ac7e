import chalk from 'chalk';
import type { SchemaField } from './types';

export interface SchemaNode {
  field: SchemaField;
  /** Dotted path from the root, e.g. `address.city`. */
  path: string;
  level: number;
  hasChildren: boolean;
}

export type ExpandedPaths = ReadonlySet<string> | 'all';

function isExpanded(expanded: ExpandedPaths, path: string): boolean {
  return expanded === 'all' || expanded.has(path);
}

/**
 * Flattens nested RECORD fields into display order. Children of a node are
 * included only while its path is expanded.
 */
export function flattenSchema(
  fields: readonly SchemaField[],
  expanded: ExpandedPaths = 'all'
): SchemaNode[] {
  const nodes: SchemaNode[] = [];

  const visit = (current: readonly SchemaField[], parentPath: string, level: number): void => {
    for (const field of current) {
      const path = parentPath ? `${parentPath}.${field.name}` : field.name;
      const children = field.fields ?? [];
      const hasChildren = children.length > 0;

      nodes.push({ field, path, level, hasChildren });

      if (hasChildren && isExpanded(expanded, path)) {
        visit(children, path, level + 1);
      }
    }
  };

  visit(fields, '', 0);
  return nodes;
}

export interface RenderOptions {
  colors?: boolean;
}

export function renderSchemaTree(
  nodes: readonly SchemaNode[],
  expanded: ExpandedPaths = 'all',
  options: RenderOptions = {}
): string[] {
  const colors = options.colors ?? false;
  const paint = (text: string, colorFn: (text: string) => string): string =>
    colors ? colorFn(text) : text;

  return nodes.map((node) => {
    const indent = '  '.repeat(node.level);
    let expandIcon = '  ';
    if (node.hasChildren) {
      expandIcon = isExpanded(expanded, node.path) ? '▼ ' : '▶ ';
    }

    let mode = '';
    if (node.field.mode === 'REQUIRED') {
      mode = paint(' REQUIRED', chalk.red);
    } else if (node.field.mode === 'REPEATED') {
      mode = paint(' REPEATED', chalk.yellow);
    }

    const type = paint(node.field.type, chalk.blue);
    return `${indent}├─${expandIcon}${node.field.name} ${type}${mode}`;
  });
}
