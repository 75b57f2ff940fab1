import { DatabaseTypeName } from '../lib/database-type';
import { PipelineDataSource } from '../models/pipeline-data-source';

export interface DatabaseTypedService {
  readonly databaseType: DatabaseTypeName;
}

/**
 * Dialect-specific rules a source must satisfy before incremental capture.
 * Both checks return silently or raise a {@link DialectCheckError} subclass.
 */
export interface DialectDataSourceChecker extends DatabaseTypedService {
  checkPrivilege(dataSource: PipelineDataSource): Promise<void>;
  checkVariable(dataSource: PipelineDataSource): Promise<void>;
}

/**
 * Dialect override for statements whose row-limiting syntax differs
 */
export interface DialectPipelineSQLBuilder extends DatabaseTypedService {
  /** `qualifiedTableName` is already quoted and schema-qualified */
  buildCheckEmptySQL(qualifiedTableName: string): string;
}

export interface DatabaseTypedServiceMap {
  DialectDataSourceChecker: DialectDataSourceChecker;
  DialectPipelineSQLBuilder: DialectPipelineSQLBuilder;
}

export type DatabaseTypedServiceKind = keyof DatabaseTypedServiceMap;
