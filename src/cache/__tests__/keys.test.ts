import { metadataKey, schemaKey, tableListKey } from '../keys';

describe('cache keys', () => {
  it('builds namespaced keys', () => {
    expect(tableListKey('test-project', 'sales')).toBe('tables:test-project.sales');
    expect(schemaKey('test-project', 'sales', 'orders')).toBe('schema:test-project.sales.orders');
    expect(metadataKey('test-project', 'sales', 'orders')).toBe(
      'metadata:test-project.sales.orders'
    );
  });

  it('keeps namespaces apart for the same table', () => {
    expect(schemaKey('p-test1', 'd', 't')).not.toBe(metadataKey('p-test1', 'd', 't'));
  });
});
