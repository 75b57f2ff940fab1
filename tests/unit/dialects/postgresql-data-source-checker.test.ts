/**
 * PostgreSQL and openGauss Data Source Checker Tests
 * Tests role attribute and wal_level checks
 */

import { OpenGaussDataSourceChecker } from '../../../src/dialects/opengauss/opengauss-data-source-checker';
import {
  PostgreSQLDataSourceChecker,
  SHOW_WAL_LEVEL_SQL,
  buildRoleQuery
} from '../../../src/dialects/postgresql/postgresql-data-source-checker';
import {
  InsufficientPrivilegeError,
  InvalidVariableError,
  PrivilegeCheckFailedError,
  UserNotFoundError,
  VariableCheckFailedError
} from '../../../src/lib/error-handler';
import { QueryRow } from '../../../src/models/pipeline-data-source';
import { FakeDataSource } from '../../helpers/fake-data-source';

function server(roleRows: QueryRow[], walLevel = 'logical'): FakeDataSource {
  return new FakeDataSource('source', {
    respond: sql => (sql === SHOW_WAL_LEVEL_SQL ? [{ wal_level: walLevel }] : roleRows)
  });
}

describe('PostgreSQLDataSourceChecker', () => {
  const checker = new PostgreSQLDataSourceChecker();

  describe('Privilege Check', () => {
    test('should query role attributes of the current user', async () => {
      const dataSource = server([{ user_name: 'repl', rolsuper: false, rolreplication: true }]);

      await checker.checkPrivilege(dataSource);

      expect(dataSource.executedSql).toEqual([
        'SELECT u.user_name, r.rolsuper, r.rolreplication FROM (SELECT current_user AS user_name) u ' +
          'LEFT JOIN pg_roles r ON r.rolname = u.user_name'
      ]);
    });

    test('should pass for a superuser', async () => {
      const dataSource = server([{ user_name: 'postgres', rolsuper: true, rolreplication: false }]);

      await expect(checker.checkPrivilege(dataSource)).resolves.toBeUndefined();
    });

    test('should fail without replication or superuser', async () => {
      const dataSource = server([{ user_name: 'app', rolsuper: false, rolreplication: false }]);

      const error = await checker.checkPrivilege(dataSource).catch(e => e);

      expect(error).toBeInstanceOf(InsufficientPrivilegeError);
      expect(error.requiredPrivileges).toEqual(['REPLICATION']);
      expect(error.context.user).toBe('app');
    });

    test('should report a user without a role entry', async () => {
      const dataSource = server([{ user_name: 'ghost', rolsuper: null, rolreplication: null }]);

      const error = await checker.checkPrivilege(dataSource).catch(e => e);

      expect(error).toBeInstanceOf(UserNotFoundError);
      expect(error.message).toBe('Source data source user `ghost` does not exist');
      expect(error.errorCode).toBe('PREPARE_JOB_USER_NOT_FOUND');
    });

    test('should report a missing user when no row comes back', async () => {
      await expect(checker.checkPrivilege(server([]))).rejects.toThrow(UserNotFoundError);
    });

    test('should wrap a query failure', async () => {
      const dataSource = new FakeDataSource('source', {
        respond: () => {
          throw new Error('permission denied for relation pg_roles');
        }
      });

      await expect(checker.checkPrivilege(dataSource)).rejects.toThrow(PrivilegeCheckFailedError);
      expect(dataSource.openConnectionCount).toBe(0);
    });
  });

  describe('Variable Check', () => {
    test('should pass with logical wal_level', async () => {
      const dataSource = server([], 'LOGICAL');

      await expect(checker.checkVariable(dataSource)).resolves.toBeUndefined();
      expect(dataSource.executedSql).toEqual(['SHOW wal_level']);
    });

    test('should fail with replica wal_level', async () => {
      const error = await checker.checkVariable(server([], 'replica')).catch(e => e);

      expect(error).toBeInstanceOf(InvalidVariableError);
      expect(error.message).toBe('Source data source required `wal_level = logical`, now is `replica`');
    });

    test('should wrap a query failure', async () => {
      const dataSource = new FakeDataSource('source', { acquireError: new Error('timeout') });

      await expect(checker.checkVariable(dataSource)).rejects.toThrow(VariableCheckFailedError);
    });
  });
});

describe('OpenGaussDataSourceChecker', () => {
  const checker = new OpenGaussDataSourceChecker();

  test('should also read the system admin flag', async () => {
    const dataSource = server([{ user_name: 'gaussdb', rolsuper: false, rolreplication: false, rolsystemadmin: true }]);

    await expect(checker.checkPrivilege(dataSource)).resolves.toBeUndefined();
    expect(dataSource.executedSql).toEqual([buildRoleQuery(['rolsuper', 'rolreplication', 'rolsystemadmin'])]);
  });

  test('should list both accepted privileges when none is held', async () => {
    const dataSource = server([{ user_name: 'app', rolsuper: false, rolreplication: false, rolsystemadmin: false }]);

    const error = await checker.checkPrivilege(dataSource).catch(e => e);

    expect(error).toBeInstanceOf(InsufficientPrivilegeError);
    expect(error.message).toBe('Source data source lacks required privileges: REPLICATION, SYSADMIN');
  });

  test('should check wal_level like PostgreSQL', async () => {
    await expect(checker.checkVariable(server([], 'minimal'))).rejects.toThrow(InvalidVariableError);
  });
});
