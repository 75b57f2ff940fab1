import { DialectPipelineSQLBuilder } from '../contracts';

export class SQLServerPipelineSQLBuilder implements DialectPipelineSQLBuilder {
  readonly databaseType = 'SQLServer' as const;

  buildCheckEmptySQL(qualifiedTableName: string): string {
    return `SELECT TOP 1 1 FROM ${qualifiedTableName}`;
  }
}
