/**
 * Importer Configuration Model Tests
 */

import { ConfigurationError } from '../../../src/lib/error-handler';
import {
  TableAndSchemaNameMapper,
  createImporterConfiguration,
  parseQualifiedTableName
} from '../../../src/models/importer-configuration';

describe('parseQualifiedTableName', () => {
  test('should split schema and table at the first dot', () => {
    expect(parseQualifiedTableName('s.orders')).toEqual({ schemaName: 's', tableName: 'orders' });
    expect(parseQualifiedTableName('a.b.c')).toEqual({ schemaName: 'a', tableName: 'b.c' });
  });

  test('should accept a bare table name', () => {
    expect(parseQualifiedTableName(' orders ')).toEqual({ tableName: 'orders' });
  });

  test('should reject blank entries', () => {
    expect(() => parseQualifiedTableName('  ')).toThrow(ConfigurationError);
    expect(() => parseQualifiedTableName('  ')).toThrow('Table name must not be empty');
  });

  test('should reject a missing schema or table part', () => {
    expect(() => parseQualifiedTableName('.orders')).toThrow('Invalid qualified table name: .orders');
    expect(() => parseQualifiedTableName('s.')).toThrow('Invalid qualified table name: s.');
  });
});

describe('TableAndSchemaNameMapper', () => {
  test('should look up schemas case-insensitively', () => {
    const mapper = new TableAndSchemaNameMapper({ Orders: 'sales' });

    expect(mapper.getSchemaName('orders')).toBe('sales');
    expect(mapper.getSchemaName('ORDERS')).toBe('sales');
  });

  test('should accept a Map', () => {
    const mapper = new TableAndSchemaNameMapper(new Map([['orders', 'sales']]));

    expect(mapper.getSchemaName('orders')).toBe('sales');
  });

  test('should return undefined for unmapped or schema-less tables', () => {
    const mapper = new TableAndSchemaNameMapper({ orders: '' });

    expect(mapper.getSchemaName('orders')).toBeUndefined();
    expect(mapper.getSchemaName('customers')).toBeUndefined();
  });

  test('should build from qualified names', () => {
    const mapper = TableAndSchemaNameMapper.fromQualifiedTableNames(['s.orders', 'order_items']);

    expect(mapper.getSchemaName('orders')).toBe('s');
    expect(mapper.getSchemaName('order_items')).toBeUndefined();
  });
});

describe('createImporterConfiguration', () => {
  test('should keep table order', () => {
    const importerConfig = createImporterConfiguration(['s.orders', 's.order_items', 'customers']);

    expect(importerConfig.logicTableNames).toEqual(['orders', 'order_items', 'customers']);
    expect(importerConfig.tableAndSchemaNameMapper.getSchemaName('order_items')).toBe('s');
  });

  test('should drop a repeated entry for the same schema', () => {
    const importerConfig = createImporterConfiguration(['s.orders', 's.Orders']);

    expect(importerConfig.logicTableNames).toEqual(['orders']);
    expect(importerConfig.tableAndSchemaNameMapper.getSchemaName('orders')).toBe('s');
  });

  test('should reject the same table under two schemas', () => {
    expect(() => createImporterConfiguration(['a.orders', 'b.orders'])).toThrow(ConfigurationError);
    expect(() => createImporterConfiguration(['a.orders', 'b.orders'])).toThrow(
      'Target table `orders` is listed under more than one schema: b.orders'
    );
  });

  test('should reject a bare and a qualified entry for one table', () => {
    expect(() => createImporterConfiguration(['orders', 's.orders'])).toThrow(
      'Target table `orders` is listed under more than one schema: s.orders'
    );
  });

  test('should allow an empty table list', () => {
    expect(createImporterConfiguration([]).logicTableNames).toEqual([]);
  });
});
