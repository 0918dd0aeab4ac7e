import { flattenSchema, renderSchemaTree } from '../schema-tree';
import type { SchemaField } from '../types';

const fields: SchemaField[] = [
  { name: 'id', type: 'INTEGER', mode: 'REQUIRED' },
  {
    name: 'address',
    type: 'RECORD',
    fields: [
      { name: 'city', type: 'STRING' },
      { name: 'geo', type: 'RECORD', fields: [{ name: 'lat', type: 'FLOAT' }] },
    ],
  },
  { name: 'tags', type: 'STRING', mode: 'REPEATED' },
];

describe('flattenSchema', () => {
  it('includes every nested field when fully expanded', () => {
    const nodes = flattenSchema(fields);

    expect(nodes.map((node) => [node.path, node.level, node.hasChildren])).toEqual([
      ['id', 0, false],
      ['address', 0, true],
      ['address.city', 1, false],
      ['address.geo', 1, true],
      ['address.geo.lat', 2, false],
      ['tags', 0, false],
    ]);
  });

  it('hides children of collapsed records', () => {
    const nodes = flattenSchema(fields, new Set(['address']));

    expect(nodes.map((node) => node.path)).toEqual([
      'id',
      'address',
      'address.city',
      'address.geo',
      'tags',
    ]);
  });

  it('returns nothing for an empty schema', () => {
    expect(flattenSchema([])).toEqual([]);
  });
});

describe('renderSchemaTree', () => {
  it('renders indentation, expansion markers and modes', () => {
    expect(renderSchemaTree(flattenSchema(fields))).toEqual([
      '├─  id INTEGER REQUIRED',
      '├─▼ address RECORD',
      '  ├─  city STRING',
      '  ├─▼ geo RECORD',
      '    ├─  lat FLOAT',
      '├─  tags STRING REPEATED',
    ]);
  });

  it('marks collapsed records', () => {
    const expanded = new Set(['address']);

    expect(renderSchemaTree(flattenSchema(fields, expanded), expanded)).toEqual([
      '├─  id INTEGER REQUIRED',
      '├─▼ address RECORD',
      '  ├─  city STRING',
      '  ├─▶ geo RECORD',
      '├─  tags STRING REPEATED',
    ]);
  });
});
