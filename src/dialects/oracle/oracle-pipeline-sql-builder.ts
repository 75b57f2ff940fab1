import { DialectPipelineSQLBuilder } from '../contracts';

export class OraclePipelineSQLBuilder implements DialectPipelineSQLBuilder {
  readonly databaseType = 'Oracle' as const;

  buildCheckEmptySQL(qualifiedTableName: string): string {
    return `SELECT 1 FROM ${qualifiedTableName} WHERE ROWNUM < 2`;
  }
}
