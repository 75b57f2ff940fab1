// Database Connection Utility
// Adapts driver pools to the pipeline data source contract

import { Pool, PoolClient, PoolConfig } from 'pg';
import mysql, { Pool as MySQLPool, PoolConnection, RowDataPacket } from 'mysql2/promise';
import Database from 'better-sqlite3';
import { DatabaseConfig, getMaskedConnectionString } from './environment-config';
import { getDatabaseType } from './database-type';
import { ConfigurationError, getLogger } from './error-handler';
import { PipelineConnection, PipelineDataSource, QueryRow } from '../models/pipeline-data-source';

type SqliteDb = InstanceType<typeof Database>;

function isQueryRow(value: unknown): value is QueryRow {
  return typeof value === 'object' && value !== null;
}

/**
 * Tracks which driver handle backs each connection handed out
 */
abstract class PooledDataSource<THandle> implements PipelineDataSource {
  private readonly handles = new Map<PipelineConnection, THandle>();

  constructor(readonly name: string) {}

  async acquire(): Promise<PipelineConnection> {
    const handle = await this.openHandle();
    const connection: PipelineConnection = {
      query: (sql, params) => this.queryHandle(handle, sql, params)
    };
    this.handles.set(connection, handle);
    return connection;
  }

  async release(connection: PipelineConnection): Promise<void> {
    const handle = this.handles.get(connection);
    if (handle === undefined) {
      throw new Error(`Connection was not acquired from data source '${this.name}'`);
    }
    this.handles.delete(connection);
    await this.closeHandle(handle);
  }

  /**
   * Connections currently borrowed and not yet released
   */
  get activeConnectionCount(): number {
    return this.handles.size;
  }

  protected abstract openHandle(): Promise<THandle>;
  protected abstract queryHandle(handle: THandle, sql: string, params?: unknown[]): Promise<QueryRow[]>;
  protected abstract closeHandle(handle: THandle): Promise<void>;
}

/**
 * PostgreSQL and openGauss, over a `pg` pool
 */
export class PostgresDataSource extends PooledDataSource<PoolClient> {
  constructor(name: string, private readonly pool: Pool) {
    super(name);
  }

  protected async openHandle(): Promise<PoolClient> {
    return this.pool.connect();
  }

  protected async queryHandle(client: PoolClient, sql: string, params?: unknown[]): Promise<QueryRow[]> {
    const result = await client.query(sql, params);
    return result.rows;
  }

  protected async closeHandle(client: PoolClient): Promise<void> {
    client.release();
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

/**
 * MySQL and MariaDB, over a `mysql2` pool
 */
export class MySQLDataSource extends PooledDataSource<PoolConnection> {
  constructor(name: string, private readonly pool: MySQLPool) {
    super(name);
  }

  protected async openHandle(): Promise<PoolConnection> {
    return this.pool.getConnection();
  }

  protected async queryHandle(connection: PoolConnection, sql: string, params?: unknown[]): Promise<QueryRow[]> {
    const [rows] = await connection.query<RowDataPacket[]>(sql, params);
    return rows;
  }

  protected async closeHandle(connection: PoolConnection): Promise<void> {
    connection.release();
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

/**
 * SQLite file opened read-only per connection; the file must already exist
 */
export class SqliteDataSource extends PooledDataSource<SqliteDb> {
  constructor(name: string, private readonly filename: string) {
    super(name);
  }

  protected async openHandle(): Promise<SqliteDb> {
    return new Database(this.filename, { readonly: true, fileMustExist: true });
  }

  protected async queryHandle(db: SqliteDb, sql: string, params: unknown[] = []): Promise<QueryRow[]> {
    return db.prepare(sql).all(...params).filter(isQueryRow);
  }

  protected async closeHandle(db: SqliteDb): Promise<void> {
    db.close();
  }
}

/**
 * Builds a data source for the configured database type. Pools connect lazily.
 */
export function createDataSource(name: string, config: DatabaseConfig): PipelineDataSource {
  const databaseType = getDatabaseType(config.type);
  const family = databaseType.trunkDatabaseType ?? databaseType.name;
  const logger = getLogger();

  switch (family) {
    case 'PostgreSQL': {
      const poolConfig: PoolConfig = {
        host: config.host,
        port: config.port,
        database: config.database,
        user: config.user,
        password: config.password,
        max: 2,
        connectionTimeoutMillis: config.connectionTimeoutMillis || 30000,
        ssl: config.ssl ? { rejectUnauthorized: false } : false
      };
      const pool = new Pool(poolConfig);
      pool.on('error', err => {
        logger.error(`Database pool error for '${name}'`, err);
      });
      return new PostgresDataSource(name, pool);
    }
    case 'MySQL': {
      const pool = mysql.createPool({
        host: config.host,
        port: config.port,
        database: config.database,
        user: config.user,
        password: config.password,
        connectionLimit: 2,
        connectTimeout: config.connectionTimeoutMillis || 30000,
        ssl: config.ssl ? { rejectUnauthorized: false } : undefined
      });
      return new MySQLDataSource(name, pool);
    }
    case 'SQLite':
      return new SqliteDataSource(name, config.database);
    default:
      throw new ConfigurationError(
        `No bundled driver for ${databaseType.name}; supply a PipelineDataSource for ${getMaskedConnectionString(config)}`,
        { database_type: databaseType.name }
      );
  }
}

/**
 * Borrows a connection for one operation and always gives it back.
 * When the operation fails, its error is raised even if the release fails too.
 */
export async function withConnection<T>(
  dataSource: PipelineDataSource,
  operation: (connection: PipelineConnection) => Promise<T>
): Promise<T> {
  const connection = await dataSource.acquire();
  let result: T;
  try {
    result = await operation(connection);
  } catch (error) {
    try {
      await dataSource.release(connection);
    } catch (releaseError) {
      getLogger().warn(`Failed to release connection to '${dataSource.name}'`, {
        data_source: dataSource.name,
        error_message: releaseError instanceof Error ? releaseError.message : String(releaseError)
      });
    }
    throw error;
  }
  await dataSource.release(connection);
  return result;
}

export async function closeDataSource(dataSource: PipelineDataSource): Promise<void> {
  if (dataSource.close) {
    await dataSource.close();
  }
}
