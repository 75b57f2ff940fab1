/**
 * Pipeline SQL Builder Tests
 * Tests identifier quoting, schema qualification and dialect emptiness probes
 */

import { getDatabaseType } from '../../../src/lib/database-type';
import { ConfigurationError } from '../../../src/lib/error-handler';
import { PipelineCommonSQLBuilder, PipelineSQLSegmentBuilder } from '../../../src/lib/pipeline-sql-builder';
import { createDefaultServiceRegistry } from '../../../src/dialects';
import { DatabaseTypedServiceRegistry } from '../../../src/dialects/database-typed-service-registry';

function builderFor(typeName: string): PipelineCommonSQLBuilder {
  return new PipelineCommonSQLBuilder(getDatabaseType(typeName), createDefaultServiceRegistry());
}

describe('PipelineSQLSegmentBuilder', () => {
  describe('Identifier Escaping', () => {
    test('should wrap identifiers in the dialect quote pair', () => {
      expect(new PipelineSQLSegmentBuilder(getDatabaseType('PostgreSQL')).getEscapedIdentifier('orders')).toBe('"orders"');
      expect(new PipelineSQLSegmentBuilder(getDatabaseType('MySQL')).getEscapedIdentifier('orders')).toBe('`orders`');
      expect(new PipelineSQLSegmentBuilder(getDatabaseType('SQLServer')).getEscapedIdentifier('orders')).toBe('[orders]');
    });

    test('should double an embedded closing quote', () => {
      expect(new PipelineSQLSegmentBuilder(getDatabaseType('PostgreSQL')).getEscapedIdentifier('a"b')).toBe('"a""b"');
      expect(new PipelineSQLSegmentBuilder(getDatabaseType('MySQL')).getEscapedIdentifier('a`b')).toBe('`a``b`');
      expect(new PipelineSQLSegmentBuilder(getDatabaseType('SQLServer')).getEscapedIdentifier('a]b')).toBe('[a]]b]');
    });

    test('should leave an opening bracket as is', () => {
      expect(new PipelineSQLSegmentBuilder(getDatabaseType('SQLServer')).getEscapedIdentifier('a[b')).toBe('[a[b]');
    });

    test('should keep an injection attempt inside one identifier', () => {
      const escaped = new PipelineSQLSegmentBuilder(getDatabaseType('PostgreSQL'))
        .getEscapedIdentifier('orders"; DROP TABLE users; --');

      expect(escaped).toBe('"orders""; DROP TABLE users; --"');
    });
  });

  describe('Table Qualification', () => {
    test('should qualify with the schema when the dialect has schemas', () => {
      const builder = new PipelineSQLSegmentBuilder(getDatabaseType('PostgreSQL'));

      expect(builder.getQualifiedTableName('s', 'orders')).toBe('"s"."orders"');
    });

    test('should leave the table unqualified without a schema', () => {
      const builder = new PipelineSQLSegmentBuilder(getDatabaseType('PostgreSQL'));

      expect(builder.getQualifiedTableName(undefined, 'orders')).toBe('"orders"');
      expect(builder.getQualifiedTableName('', 'orders')).toBe('"orders"');
    });

    test('should ignore the schema for dialects without schemas', () => {
      const builder = new PipelineSQLSegmentBuilder(getDatabaseType('MySQL'));

      expect(builder.getQualifiedTableName('s', 'orders')).toBe('`orders`');
    });

    test('should reject an empty table name', () => {
      const builder = new PipelineSQLSegmentBuilder(getDatabaseType('PostgreSQL'));

      expect(() => builder.getQualifiedTableName('s', '')).toThrow(ConfigurationError);
      expect(() => builder.getQualifiedTableName('s', '')).toThrow('Table name must not be empty');
    });
  });
});

describe('PipelineCommonSQLBuilder', () => {
  describe('Emptiness Probe', () => {
    test('should build a LIMIT probe for PostgreSQL', () => {
      expect(builderFor('PostgreSQL').buildCheckEmptySQL('s', 'orders')).toBe('SELECT 1 FROM "s"."orders" LIMIT 1');
      expect(builderFor('PostgreSQL').buildCheckEmptySQL(undefined, 'orders')).toBe('SELECT 1 FROM "orders" LIMIT 1');
    });

    test('should build the same probe for openGauss', () => {
      expect(builderFor('openGauss').buildCheckEmptySQL('s', 'orders')).toBe('SELECT 1 FROM "s"."orders" LIMIT 1');
    });

    test('should build an unqualified probe for MySQL and MariaDB', () => {
      expect(builderFor('MySQL').buildCheckEmptySQL('s', 'orders')).toBe('SELECT 1 FROM `orders` LIMIT 1');
      expect(builderFor('MariaDB').buildCheckEmptySQL('s', 'orders')).toBe('SELECT 1 FROM `orders` LIMIT 1');
    });

    test('should use ROWNUM on Oracle', () => {
      expect(builderFor('Oracle').buildCheckEmptySQL('APP', 'ORDERS')).toBe('SELECT 1 FROM "APP"."ORDERS" WHERE ROWNUM < 2');
    });

    test('should use TOP on SQL Server', () => {
      expect(builderFor('SQLServer').buildCheckEmptySQL('dbo', 'orders')).toBe('SELECT TOP 1 1 FROM [dbo].[orders]');
    });

    test('should build a LIMIT probe for SQLite', () => {
      expect(builderFor('SQLite').buildCheckEmptySQL('main', 'orders')).toBe('SELECT 1 FROM "main"."orders" LIMIT 1');
    });

    test('should fall back to the common probe when no dialect builder is registered', () => {
      const builder = new PipelineCommonSQLBuilder(getDatabaseType('Oracle'), new DatabaseTypedServiceRegistry());

      expect(builder.buildCheckEmptySQL('APP', 'ORDERS')).toBe('SELECT 1 FROM "APP"."ORDERS" LIMIT 1');
    });

    test('should return the same statement on repeated calls', () => {
      const builder = builderFor('PostgreSQL');

      expect(builder.buildCheckEmptySQL('s', 'orders')).toBe(builder.buildCheckEmptySQL('s', 'orders'));
    });
  });
});
