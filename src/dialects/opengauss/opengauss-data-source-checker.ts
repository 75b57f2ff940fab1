import { DialectDataSourceChecker } from '../contracts';
import { checkRolePrivilege, checkWalLevel } from '../postgresql/postgresql-data-source-checker';
import { PipelineDataSource } from '../../models/pipeline-data-source';

/**
 * openGauss grants replication through `rolsystemadmin` as well as the PostgreSQL role flags
 */
export class OpenGaussDataSourceChecker implements DialectDataSourceChecker {
  readonly databaseType = 'openGauss' as const;

  async checkPrivilege(dataSource: PipelineDataSource): Promise<void> {
    await checkRolePrivilege(dataSource, ['rolsuper', 'rolreplication', 'rolsystemadmin'], ['REPLICATION', 'SYSADMIN']);
  }

  async checkVariable(dataSource: PipelineDataSource): Promise<void> {
    await checkWalLevel(dataSource);
  }
}
