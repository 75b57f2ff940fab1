export { DataSourceCheckEngine, DataSourceCheckEngineOptions } from './services/data-source-check-engine';
export { PipelineCommonSQLBuilder, PipelineSQLSegmentBuilder } from './lib/pipeline-sql-builder';
export { DATABASE_TYPES, DatabaseType, DatabaseTypeName, QuoteCharacter, getDatabaseType } from './lib/database-type';
export {
  MySQLDataSource,
  PostgresDataSource,
  SqliteDataSource,
  closeDataSource,
  createDataSource,
  withConnection
} from './lib/database-connections';
export * from './lib/error-handler';
export * from './dialects';
export * from './models/importer-configuration';
export * from './models/pipeline-data-source';
