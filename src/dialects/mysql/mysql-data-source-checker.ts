import { DialectDataSourceChecker } from '../contracts';
import { withConnection } from '../../lib/database-connections';
import {
  InsufficientPrivilegeError,
  InvalidVariableError,
  PrivilegeCheckFailedError,
  VariableCheckFailedError
} from '../../lib/error-handler';
import { PipelineDataSource, QueryRow } from '../../models/pipeline-data-source';

const SHOW_GRANTS_SQL = 'SHOW GRANTS';

const SHOW_VARIABLES_SQL =
  "SHOW GLOBAL VARIABLES WHERE Variable_name IN ('log_bin', 'binlog_format', 'binlog_row_image')";

// A global grant satisfies the check when it lists every entry of one set
const REQUIRED_PRIVILEGES: readonly (readonly string[])[] = [
  ['ALL PRIVILEGES'],
  ['SELECT', 'REPLICATION SLAVE', 'REPLICATION CLIENT']
];

const GRANT_PATTERN = /^GRANT\s+(.+?)\s+ON\s+(\S+)\s+TO\s/i;

const GLOBAL_GRANT_TARGET = '*.*';

const REPORTED_PRIVILEGES = ['SELECT', 'REPLICATION SLAVE', 'REPLICATION CLIENT'];

// Checked in this order; the first mismatch is reported
const REQUIRED_VARIABLES: ReadonlyArray<readonly [string, string]> = [
  ['LOG_BIN', 'ON'],
  ['BINLOG_FORMAT', 'ROW'],
  ['BINLOG_ROW_IMAGE', 'FULL']
];

function firstColumn(row: QueryRow): string {
  const [value] = Object.values(row);
  return value === undefined || value === null ? '' : String(value);
}

/**
 * Privileges of a grant on every database; empty for grants on narrower targets
 */
export function parseGlobalPrivileges(grant: string): Set<string> {
  const match = GRANT_PATTERN.exec(grant.trim());
  if (!match || match[2] !== GLOBAL_GRANT_TARGET) {
    return new Set();
  }
  return new Set(match[1].split(',').map(each => each.trim().toUpperCase()));
}

function stringValue(value: unknown): string {
  return value === undefined || value === null ? '' : String(value);
}

/**
 * Binlog-based capture needs replication grants and a row-format, full-image binlog.
 * Registered for MySQL; MariaDB resolves to it through its trunk type.
 */
export class MySQLDataSourceChecker implements DialectDataSourceChecker {
  readonly databaseType = 'MySQL' as const;

  async checkPrivilege(dataSource: PipelineDataSource): Promise<void> {
    let grants: string[];
    try {
      grants = await withConnection(dataSource, async connection =>
        (await connection.query(SHOW_GRANTS_SQL)).map(firstColumn)
      );
    } catch (error) {
      throw new PrivilegeCheckFailedError(error, { data_source: dataSource.name });
    }

    const granted = grants.some(grant => {
      const privileges = parseGlobalPrivileges(grant);
      return REQUIRED_PRIVILEGES.some(required => required.every(each => privileges.has(each)));
    });
    if (!granted) {
      throw new InsufficientPrivilegeError(REPORTED_PRIVILEGES, { data_source: dataSource.name });
    }
  }

  async checkVariable(dataSource: PipelineDataSource): Promise<void> {
    const variables = new Map<string, string>();
    try {
      const rows = await withConnection(dataSource, connection => connection.query(SHOW_VARIABLES_SQL));
      for (const row of rows) {
        variables.set(stringValue(row.Variable_name).toUpperCase(), stringValue(row.Value));
      }
    } catch (error) {
      throw new VariableCheckFailedError(error, { data_source: dataSource.name });
    }

    for (const [name, expected] of REQUIRED_VARIABLES) {
      const actual = variables.get(name) ?? '';
      if (actual.toUpperCase() !== expected) {
        throw new InvalidVariableError(name, expected, actual, { data_source: dataSource.name });
      }
    }
  }
}
