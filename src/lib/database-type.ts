/**
 * Database Type Descriptors
 *
 * Identifies a database dialect and the identifier rules the SQL builder needs.
 * A branch dialect names its trunk (openGauss -> PostgreSQL, MariaDB -> MySQL)
 * so dialect services registered for the trunk also apply to the branch.
 */

import { ConfigurationError } from './error-handler';

export type DatabaseTypeName =
  | 'PostgreSQL'
  | 'openGauss'
  | 'MySQL'
  | 'MariaDB'
  | 'Oracle'
  | 'SQLServer'
  | 'SQLite';

export interface QuoteCharacter {
  readonly start: string;
  readonly end: string;
}

export interface DatabaseType {
  readonly name: DatabaseTypeName;
  readonly trunkDatabaseType?: DatabaseTypeName;
  readonly quoteCharacter: QuoteCharacter;
  /** Whether tables are qualified by a schema distinct from the database */
  readonly schemaAvailable: boolean;
}

const DOUBLE_QUOTE: QuoteCharacter = { start: '"', end: '"' };
const BACK_QUOTE: QuoteCharacter = { start: '`', end: '`' };
const BRACKETS: QuoteCharacter = { start: '[', end: ']' };

export const DATABASE_TYPES: Readonly<Record<DatabaseTypeName, DatabaseType>> = {
  PostgreSQL: { name: 'PostgreSQL', quoteCharacter: DOUBLE_QUOTE, schemaAvailable: true },
  openGauss: { name: 'openGauss', trunkDatabaseType: 'PostgreSQL', quoteCharacter: DOUBLE_QUOTE, schemaAvailable: true },
  MySQL: { name: 'MySQL', quoteCharacter: BACK_QUOTE, schemaAvailable: false },
  MariaDB: { name: 'MariaDB', trunkDatabaseType: 'MySQL', quoteCharacter: BACK_QUOTE, schemaAvailable: false },
  Oracle: { name: 'Oracle', quoteCharacter: DOUBLE_QUOTE, schemaAvailable: true },
  SQLServer: { name: 'SQLServer', quoteCharacter: BRACKETS, schemaAvailable: true },
  SQLite: { name: 'SQLite', quoteCharacter: DOUBLE_QUOTE, schemaAvailable: true }
};

const ALIASES: Record<string, DatabaseTypeName> = {
  postgres: 'PostgreSQL',
  pg: 'PostgreSQL',
  mssql: 'SQLServer',
  'sql server': 'SQLServer'
};

/**
 * Resolves a database type by name, case-insensitively
 */
export function getDatabaseType(name: string): DatabaseType {
  const normalized = name.trim().toLowerCase();
  const alias = ALIASES[normalized];
  const match = alias
    ? DATABASE_TYPES[alias]
    : Object.values(DATABASE_TYPES).find(each => each.name.toLowerCase() === normalized);

  if (!match) {
    throw new ConfigurationError(
      `Unsupported database type: ${name}. Must be one of: ${Object.keys(DATABASE_TYPES).join(', ')}`,
      { database_type: name }
    );
  }
  return match;
}
