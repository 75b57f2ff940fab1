import { DialectDataSourceChecker } from '../contracts';
import { withConnection } from '../../lib/database-connections';
import {
  InsufficientPrivilegeError,
  InvalidVariableError,
  PrivilegeCheckFailedError,
  UserNotFoundError,
  VariableCheckFailedError
} from '../../lib/error-handler';
import { PipelineDataSource, QueryRow } from '../../models/pipeline-data-source';

export const SHOW_WAL_LEVEL_SQL = 'SHOW wal_level';

/**
 * Role attributes of the connected user. The outer join keeps a row, with
 * null attributes, when the user has no pg_roles entry.
 */
export function buildRoleQuery(roleColumns: readonly string[]): string {
  const columns = roleColumns.map(each => `r.${each}`).join(', ');
  return `SELECT u.user_name, ${columns} FROM (SELECT current_user AS user_name) u ` +
    'LEFT JOIN pg_roles r ON r.rolname = u.user_name';
}

/**
 * Passes when any of the role columns is true for the connected user
 */
export async function checkRolePrivilege(
  dataSource: PipelineDataSource,
  roleColumns: readonly string[],
  requiredPrivileges: string[]
): Promise<void> {
  let rows: QueryRow[];
  try {
    rows = await withConnection(dataSource, connection => connection.query(buildRoleQuery(roleColumns)));
  } catch (error) {
    throw new PrivilegeCheckFailedError(error, { data_source: dataSource.name });
  }

  const [row] = rows;
  const userName = row ? String(row.user_name ?? '') : '';
  if (!row || roleColumns.every(each => row[each] === null || row[each] === undefined)) {
    throw new UserNotFoundError(userName, { data_source: dataSource.name });
  }
  if (!roleColumns.some(each => row[each] === true)) {
    throw new InsufficientPrivilegeError(requiredPrivileges, { data_source: dataSource.name, user: userName });
  }
}

/**
 * Logical decoding requires `wal_level = logical`
 */
export async function checkWalLevel(dataSource: PipelineDataSource): Promise<void> {
  let rows: QueryRow[];
  try {
    rows = await withConnection(dataSource, connection => connection.query(SHOW_WAL_LEVEL_SQL));
  } catch (error) {
    throw new VariableCheckFailedError(error, { data_source: dataSource.name });
  }

  const actual = rows.length > 0 ? String(rows[0].wal_level ?? '') : '';
  if (actual.toLowerCase() !== 'logical') {
    throw new InvalidVariableError('wal_level', 'logical', actual, { data_source: dataSource.name });
  }
}

export class PostgreSQLDataSourceChecker implements DialectDataSourceChecker {
  readonly databaseType = 'PostgreSQL' as const;

  async checkPrivilege(dataSource: PipelineDataSource): Promise<void> {
    await checkRolePrivilege(dataSource, ['rolsuper', 'rolreplication'], ['REPLICATION']);
  }

  async checkVariable(dataSource: PipelineDataSource): Promise<void> {
    await checkWalLevel(dataSource);
  }
}
