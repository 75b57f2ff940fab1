import { DatabaseType, DatabaseTypeName } from '../lib/database-type';
import { DatabaseTypedServiceKind, DatabaseTypedServiceMap } from './contracts';

type ServiceTables = {
  [K in DatabaseTypedServiceKind]: Map<DatabaseTypeName, DatabaseTypedServiceMap[K]>;
};

/**
 * Dialect services keyed by service kind and database type.
 * Lookup falls back to the trunk database type; a miss is a normal result.
 */
export class DatabaseTypedServiceRegistry {
  private readonly services: ServiceTables = {
    DialectDataSourceChecker: new Map(),
    DialectPipelineSQLBuilder: new Map()
  };

  register<K extends DatabaseTypedServiceKind>(kind: K, service: DatabaseTypedServiceMap[K]): this {
    const table: ServiceTables[K] = this.services[kind];
    table.set(service.databaseType, service);
    return this;
  }

  findService<K extends DatabaseTypedServiceKind>(
    kind: K,
    databaseType: DatabaseType
  ): DatabaseTypedServiceMap[K] | undefined {
    const table: ServiceTables[K] = this.services[kind];
    const service = table.get(databaseType.name);
    if (service || !databaseType.trunkDatabaseType) {
      return service;
    }
    return table.get(databaseType.trunkDatabaseType);
  }
}
