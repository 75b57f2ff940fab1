/**
 * Pipeline SQL Builder
 *
 * Builds the statements the pre-flight checks run. Identifiers are always
 * quoted with the dialect's quote pair; an embedded closing quote is doubled,
 * so table and schema names never reach the statement unescaped.
 */

import { DatabaseType } from './database-type';
import { ConfigurationError } from './error-handler';
import { DialectPipelineSQLBuilder } from '../dialects/contracts';
import { DatabaseTypedServiceRegistry } from '../dialects/database-typed-service-registry';

/**
 * Quotes and escapes identifiers for one database type
 */
export class PipelineSQLSegmentBuilder {
  constructor(private readonly databaseType: DatabaseType) {}

  getEscapedIdentifier(identifier: string): string {
    const { start, end } = this.databaseType.quoteCharacter;
    return `${start}${identifier.split(end).join(end + end)}${end}`;
  }

  /**
   * Schema-qualifies only when the dialect has schemas and a schema name is given
   */
  getQualifiedTableName(schemaName: string | undefined, tableName: string): string {
    if (!tableName) {
      throw new ConfigurationError('Table name must not be empty', { schema_name: schemaName });
    }

    const escapedTableName = this.getEscapedIdentifier(tableName);
    if (!this.databaseType.schemaAvailable || !schemaName) {
      return escapedTableName;
    }
    return `${this.getEscapedIdentifier(schemaName)}.${escapedTableName}`;
  }
}

export class PipelineCommonSQLBuilder {
  private readonly segmentBuilder: PipelineSQLSegmentBuilder;
  private readonly dialectSQLBuilder?: DialectPipelineSQLBuilder;

  constructor(databaseType: DatabaseType, registry: DatabaseTypedServiceRegistry) {
    this.segmentBuilder = new PipelineSQLSegmentBuilder(databaseType);
    this.dialectSQLBuilder = registry.findService('DialectPipelineSQLBuilder', databaseType);
  }

  /**
   * Existence probe: zero rows for an empty table, one row of the constant `1` otherwise
   */
  buildCheckEmptySQL(schemaName: string | undefined, tableName: string): string {
    const qualifiedTableName = this.segmentBuilder.getQualifiedTableName(schemaName, tableName);
    if (this.dialectSQLBuilder) {
      return this.dialectSQLBuilder.buildCheckEmptySQL(qualifiedTableName);
    }
    return `SELECT 1 FROM ${qualifiedTableName} LIMIT 1`;
  }
}
