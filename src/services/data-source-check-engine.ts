/**
 * Data Source Check Engine
 *
 * Pre-flight checks run before a migration job moves rows. Every check is
 * read-only and fail-fast: data sources and tables are visited in the order
 * given, and the first violated precondition is raised as one typed error
 * without visiting the rest. Callers get the first problem, not a list.
 *
 * Each check borrows a fresh connection and releases it before returning,
 * whether the check passes or fails. No retries are attempted.
 */

import { DatabaseType } from '../lib/database-type';
import { withConnection } from '../lib/database-connections';
import {
  InvalidConnectionError,
  Logger,
  TargetTableNotEmptyError,
  getLogger
} from '../lib/error-handler';
import { PipelineCommonSQLBuilder } from '../lib/pipeline-sql-builder';
import { DialectDataSourceChecker } from '../dialects/contracts';
import { DatabaseTypedServiceRegistry } from '../dialects/database-typed-service-registry';
import { createDefaultServiceRegistry } from '../dialects';
import { ImporterConfiguration, TableAndSchemaNameMapper } from '../models/importer-configuration';
import { PipelineDataSource } from '../models/pipeline-data-source';

export interface DataSourceCheckEngineOptions {
  registry?: DatabaseTypedServiceRegistry;
  logger?: Logger;
}

/**
 * Stands in for dialects that register no checker, so both cases share one path
 */
const NOOP_DATA_SOURCE_CHECKER: Omit<DialectDataSourceChecker, 'databaseType'> = {
  checkPrivilege: async () => {},
  checkVariable: async () => {}
};

export class DataSourceCheckEngine {
  private readonly checker: Omit<DialectDataSourceChecker, 'databaseType'>;
  private readonly sqlBuilder: PipelineCommonSQLBuilder;
  private readonly logger: Logger;

  constructor(readonly databaseType: DatabaseType, options: DataSourceCheckEngineOptions = {}) {
    const registry = options.registry ?? createDefaultServiceRegistry();
    this.checker = registry.findService('DialectDataSourceChecker', databaseType) ?? NOOP_DATA_SOURCE_CHECKER;
    this.sqlBuilder = new PipelineCommonSQLBuilder(databaseType, registry);
    this.logger = options.logger ?? getLogger();
  }

  /**
   * Connection, then privilege, then variable checks on the source
   */
  async checkSourceDataSource(dataSource: PipelineDataSource): Promise<void> {
    const dataSources = [dataSource];
    await this.checkConnection(dataSources);
    await this.checkPrivilege(dataSources);
    await this.checkVariable(dataSources);
    this.logger.info('Source data source passed pre-flight checks', {
      data_source: dataSource.name,
      database_type: this.databaseType.name
    });
  }

  /**
   * Connection check, then every table the importer will write must be empty
   */
  async checkTargetDataSource(dataSource: PipelineDataSource, importerConfig: ImporterConfiguration): Promise<void> {
    const dataSources = [dataSource];
    await this.checkConnection(dataSources);
    await this.checkTargetTable(dataSources, importerConfig.tableAndSchemaNameMapper, importerConfig.logicTableNames);
    this.logger.info('Target data source passed pre-flight checks', {
      data_source: dataSource.name,
      database_type: this.databaseType.name,
      table_count: importerConfig.logicTableNames.length
    });
  }

  /**
   * Acquires and releases one connection per data source
   *
   * @throws InvalidConnectionError on the first data source that cannot connect
   */
  async checkConnection(dataSources: Iterable<PipelineDataSource>): Promise<void> {
    for (const each of dataSources) {
      this.logger.debug('Checking data source connection', { data_source: each.name });
      try {
        await withConnection(each, async () => undefined);
      } catch (error) {
        throw this.reportFailure(new InvalidConnectionError(error, { data_source: each.name }));
      }
    }
  }

  /**
   * @throws TargetTableNotEmptyError naming the first table holding a row
   * @throws InvalidConnectionError when a probe cannot be run
   */
  async checkTargetTable(
    dataSources: Iterable<PipelineDataSource>,
    tableAndSchemaNameMapper: TableAndSchemaNameMapper,
    logicTableNames: Iterable<string>
  ): Promise<void> {
    const tableNames = Array.from(logicTableNames);
    for (const each of dataSources) {
      for (const tableName of tableNames) {
        const schemaName = tableAndSchemaNameMapper.getSchemaName(tableName);
        if (!(await this.checkEmpty(each, schemaName, tableName))) {
          throw this.reportFailure(new TargetTableNotEmptyError(tableName, {
            data_source: each.name,
            schema_name: schemaName
          }));
        }
      }
    }
  }

  private async checkEmpty(
    dataSource: PipelineDataSource,
    schemaName: string | undefined,
    tableName: string
  ): Promise<boolean> {
    const sql = this.sqlBuilder.buildCheckEmptySQL(schemaName, tableName);
    this.logger.debug('Checking target table is empty', { data_source: dataSource.name, sql });
    try {
      const rows = await withConnection(dataSource, connection => connection.query(sql));
      return rows.length === 0;
    } catch (error) {
      throw this.reportFailure(new InvalidConnectionError(error, {
        data_source: dataSource.name,
        table_name: tableName
      }));
    }
  }

  /**
   * Dialect failures propagate as raised by the checker
   */
  async checkPrivilege(dataSources: Iterable<PipelineDataSource>): Promise<void> {
    for (const each of dataSources) {
      this.logger.debug('Checking data source privileges', { data_source: each.name });
      try {
        await this.checker.checkPrivilege(each);
      } catch (error) {
        throw this.reportFailure(error);
      }
    }
  }

  async checkVariable(dataSources: Iterable<PipelineDataSource>): Promise<void> {
    for (const each of dataSources) {
      this.logger.debug('Checking data source variables', { data_source: each.name });
      try {
        await this.checker.checkVariable(each);
      } catch (error) {
        throw this.reportFailure(error);
      }
    }
  }

  private reportFailure<T>(error: T): T {
    this.logger.error('Pre-flight check failed', error);
    return error;
  }
}
