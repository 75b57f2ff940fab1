/**
 * Importer Configuration Model
 *
 * Describes the tables a migration job will write to and how each logical
 * table name resolves to a physical schema.
 */

import { ConfigurationError } from '../lib/error-handler';

export type TableSchemaMap = ReadonlyMap<string, string | undefined> | Readonly<Record<string, string | undefined>>;

/**
 * Case-insensitive mapping from logical table name to schema name
 */
export class TableAndSchemaNameMapper {
  private readonly mapping = new Map<string, string | undefined>();

  constructor(tableSchemaMap: TableSchemaMap = {}) {
    const entries = tableSchemaMap instanceof Map
      ? Array.from(tableSchemaMap.entries())
      : Object.entries(tableSchemaMap);

    for (const [tableName, schemaName] of entries) {
      this.mapping.set(tableName.toLowerCase(), schemaName || undefined);
    }
  }

  /**
   * Builds a mapper from `schema.table` or bare `table` entries; the first entry for a table wins
   */
  static fromQualifiedTableNames(qualifiedTableNames: Iterable<string>): TableAndSchemaNameMapper {
    const mapping = new Map<string, string | undefined>();
    for (const each of qualifiedTableNames) {
      const { schemaName, tableName } = parseQualifiedTableName(each);
      const key = tableName.toLowerCase();
      if (!mapping.has(key)) {
        mapping.set(key, schemaName);
      }
    }
    return new TableAndSchemaNameMapper(mapping);
  }

  /**
   * Schema of a logical table; undefined when the table is unmapped or unqualified
   */
  getSchemaName(logicTableName: string): string | undefined {
    return this.mapping.get(logicTableName.toLowerCase());
  }
}

export interface QualifiedTableName {
  schemaName?: string;
  tableName: string;
}

/**
 * Splits `schema.table` at the first dot; a bare name has no schema
 */
export function parseQualifiedTableName(value: string): QualifiedTableName {
  const trimmed = value.trim();
  const dot = trimmed.indexOf('.');
  if (dot === -1) {
    if (!trimmed) {
      throw new ConfigurationError('Table name must not be empty');
    }
    return { tableName: trimmed };
  }

  const schemaName = trimmed.slice(0, dot).trim();
  const tableName = trimmed.slice(dot + 1).trim();
  if (!schemaName || !tableName) {
    throw new ConfigurationError(`Invalid qualified table name: ${value}`, { table: value });
  }
  return { schemaName, tableName };
}

export interface ImporterConfiguration {
  readonly tableAndSchemaNameMapper: TableAndSchemaNameMapper;
  /** Ordered, without case-insensitive duplicates */
  readonly logicTableNames: readonly string[];
}

/**
 * Builds an importer configuration from `schema.table` or `table` entries, keeping their order.
 * A repeated entry is dropped; the same table under another schema is rejected.
 */
export function createImporterConfiguration(qualifiedTableNames: readonly string[]): ImporterConfiguration {
  const seen = new Map<string, QualifiedTableName>();
  const logicTableNames: string[] = [];

  for (const each of qualifiedTableNames) {
    const parsed = parseQualifiedTableName(each);
    const key = parsed.tableName.toLowerCase();
    const previous = seen.get(key);
    if (!previous) {
      seen.set(key, parsed);
      logicTableNames.push(parsed.tableName);
    } else if (previous.schemaName !== parsed.schemaName) {
      throw new ConfigurationError(
        `Target table \`${parsed.tableName}\` is listed under more than one schema: ${each}`,
        { table_name: parsed.tableName, schema_names: [previous.schemaName, parsed.schemaName] }
      );
    }
  }

  return {
    tableAndSchemaNameMapper: TableAndSchemaNameMapper.fromQualifiedTableNames(qualifiedTableNames),
    logicTableNames
  };
}
