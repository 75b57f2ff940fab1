import { DatabaseTypedServiceRegistry } from './database-typed-service-registry';
import { MySQLDataSourceChecker } from './mysql/mysql-data-source-checker';
import { OpenGaussDataSourceChecker } from './opengauss/opengauss-data-source-checker';
import { OraclePipelineSQLBuilder } from './oracle/oracle-pipeline-sql-builder';
import { PostgreSQLDataSourceChecker } from './postgresql/postgresql-data-source-checker';
import { SQLServerPipelineSQLBuilder } from './sqlserver/sqlserver-pipeline-sql-builder';

export * from './contracts';
export { DatabaseTypedServiceRegistry } from './database-typed-service-registry';
export { MySQLDataSourceChecker } from './mysql/mysql-data-source-checker';
export { OpenGaussDataSourceChecker } from './opengauss/opengauss-data-source-checker';
export { OraclePipelineSQLBuilder } from './oracle/oracle-pipeline-sql-builder';
export { PostgreSQLDataSourceChecker } from './postgresql/postgresql-data-source-checker';
export { SQLServerPipelineSQLBuilder } from './sqlserver/sqlserver-pipeline-sql-builder';

/**
 * Registry holding the bundled dialect services
 */
export function createDefaultServiceRegistry(): DatabaseTypedServiceRegistry {
  return new DatabaseTypedServiceRegistry()
    .register('DialectDataSourceChecker', new MySQLDataSourceChecker())
    .register('DialectDataSourceChecker', new PostgreSQLDataSourceChecker())
    .register('DialectDataSourceChecker', new OpenGaussDataSourceChecker())
    .register('DialectPipelineSQLBuilder', new OraclePipelineSQLBuilder())
    .register('DialectPipelineSQLBuilder', new SQLServerPipelineSQLBuilder());
}
