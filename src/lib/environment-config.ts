/**
 * Environment Configuration Management
 *
 * Centralizes environment variable handling for the pre-flight checks.
 * Provides typed access to source/target connection settings, the tables the
 * job will populate, and logging options.
 */

import * as dotenv from 'dotenv';

// Load environment variables
dotenv.config();

/**
 * Database connection configuration
 */
export interface DatabaseConfig {
  type: string;
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  ssl?: boolean;
  connectionTimeoutMillis?: number;
}

export type LogLevelName = 'error' | 'warn' | 'info' | 'debug';

export type Environment = 'development' | 'staging' | 'production' | 'test';

export interface LoggingConfig {
  level: LogLevelName;
  format: 'json' | 'text';
  enableFileLogging: boolean;
  logDirectory: string;
}

/**
 * Complete application configuration
 */
export interface AppConfig {
  source: DatabaseConfig;
  target: DatabaseConfig;
  /** Entries of the form `schema.table` or `table`, in job order */
  targetTables: string[];
  environment: Environment;
  logging: LoggingConfig;
}

const VALID_LOG_LEVELS: readonly LogLevelName[] = ['error', 'warn', 'info', 'debug'];
const VALID_ENVIRONMENTS: readonly Environment[] = ['development', 'staging', 'production', 'test'];

const DEFAULT_PORTS: Record<string, number> = {
  postgresql: 5432,
  opengauss: 5432,
  mysql: 3306,
  mariadb: 3306,
  sqlserver: 1433,
  oracle: 1521,
  sqlite: 0
};

function isLogLevel(value: string): value is LogLevelName {
  return VALID_LOG_LEVELS.some(level => level === value);
}

function isEnvironment(value: string): value is Environment {
  return VALID_ENVIRONMENTS.some(environment => environment === value);
}

function parsePort(value: string | undefined, type: string): number {
  if (value) {
    return parseInt(value, 10);
  }
  return DEFAULT_PORTS[type.toLowerCase()] ?? 5432;
}

/**
 * Splits a comma separated list, dropping blanks
 */
export function parseList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

function readDatabaseConfig(prefix: 'SOURCE' | 'TARGET', env: NodeJS.ProcessEnv): DatabaseConfig {
  const type = env[`${prefix}_DB_TYPE`] || 'PostgreSQL';
  return {
    type,
    host: env[`${prefix}_DB_HOST`] || 'localhost',
    port: parsePort(env[`${prefix}_DB_PORT`], type),
    database: env[`${prefix}_DB_NAME`] || '',
    user: env[`${prefix}_DB_USER`] || 'postgres',
    password: env[`${prefix}_DB_PASSWORD`] || '',
    ssl: env[`${prefix}_DB_SSL`] === 'true',
    connectionTimeoutMillis: parseInt(env[`${prefix}_DB_TIMEOUT`] || '30000', 10)
  };
}

/**
 * Reads only the logging keys, so a logger can be built without database settings
 */
export function getLoggingConfig(env: NodeJS.ProcessEnv = process.env): LoggingConfig {
  const level = (env.LOG_LEVEL || 'info').toLowerCase();
  return {
    level: isLogLevel(level) ? level : 'info',
    format: env.LOG_FORMAT === 'text' ? 'text' : 'json',
    enableFileLogging: env.ENABLE_FILE_LOGGING === 'true',
    logDirectory: env.LOG_DIRECTORY || './logs'
  };
}

/**
 * Builds a configuration from an environment map
 */
export function createConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const requiredVars = ['SOURCE_DB_NAME', 'TARGET_DB_NAME'];

  const missingVars = requiredVars.filter(varName => !env[varName]);
  if (missingVars.length > 0) {
    throw new Error(
      `Missing required environment variables: ${missingVars.join(', ')}\n` +
      'Please ensure all required variables are set in your .env file.'
    );
  }

  const environment = env.NODE_ENV || 'development';
  if (!isEnvironment(environment)) {
    throw new Error(
      `Invalid environment: ${environment}. Must be one of: ${VALID_ENVIRONMENTS.join(', ')}`
    );
  }

  return {
    source: readDatabaseConfig('SOURCE', env),
    target: readDatabaseConfig('TARGET', env),
    targetTables: parseList(env.TARGET_TABLES),
    environment,
    logging: getLoggingConfig(env)
  };
}

let config: AppConfig | null = null;

/**
 * Gets the application configuration, creating it if it doesn't exist
 */
export function getConfig(): AppConfig {
  if (!config) {
    config = createConfig();
  }
  return config;
}

function bareTableName(qualifiedTableName: string): string {
  return qualifiedTableName.slice(qualifiedTableName.indexOf('.') + 1).trim().toLowerCase();
}

/**
 * Validates a configuration and throws descriptive errors for issues
 */
export function validateConfig(cfg: AppConfig = getConfig()): void {
  for (const [side, db] of [['source', cfg.source], ['target', cfg.target]] as const) {
    if (db.type.toLowerCase() !== 'sqlite' && (db.port < 1 || db.port > 65535 || Number.isNaN(db.port))) {
      throw new Error(`Invalid ${side} database port: ${db.port}`);
    }
    if (db.connectionTimeoutMillis !== undefined && Number.isNaN(db.connectionTimeoutMillis)) {
      throw new Error(`Invalid ${side} database timeout`);
    }
  }

  // One logical table name maps to one schema, so `a.orders` and `b.orders` clash
  const tableNames = cfg.targetTables.map(bareTableName);
  const duplicates = cfg.targetTables.filter((_, index) => tableNames.indexOf(tableNames[index]) !== index);
  if (duplicates.length > 0) {
    throw new Error(`Duplicate target tables: ${duplicates.join(', ')}`);
  }
}

/**
 * Returns a safe configuration object for logging (with sensitive data masked)
 */
export function getConfigForLogging(cfg: AppConfig = getConfig()): Record<string, unknown> {
  return {
    source: {
      ...cfg.source,
      password: '***masked***'
    },
    target: {
      ...cfg.target,
      password: '***masked***'
    },
    targetTables: cfg.targetTables,
    environment: cfg.environment,
    logging: cfg.logging
  };
}

/**
 * Connection string with the password masked, for diagnostics
 */
export function getMaskedConnectionString(dbConfig: DatabaseConfig): string {
  if (dbConfig.type.toLowerCase() === 'sqlite') {
    return `sqlite://${dbConfig.database}`;
  }
  return `${dbConfig.type.toLowerCase()}://${dbConfig.user}:***@${dbConfig.host}:${dbConfig.port}/${dbConfig.database}`;
}
