#!/usr/bin/env node

/**
 * Pre-flight Check CLI
 *
 * Validates the configured source and target data sources before a migration
 * job starts. Stops at the first failure and exits with status 1.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import {
  AppConfig,
  DatabaseConfig,
  getConfig,
  getConfigForLogging,
  getMaskedConnectionString,
  parseList,
  validateConfig
} from '../lib/environment-config';
import { closeDataSource, createDataSource } from '../lib/database-connections';
import { getDatabaseType } from '../lib/database-type';
import {
  ConfigurationError,
  Logger,
  LogLevel,
  PreflightBaseError,
  generateCorrelationId,
  getLogger,
  initializeLogging
} from '../lib/error-handler';
import { createImporterConfiguration } from '../models/importer-configuration';
import { PipelineDataSource } from '../models/pipeline-data-source';
import { DataSourceCheckEngine } from '../services/data-source-check-engine';

const VERSION = '1.0.0';

export interface PreflightCheckOptions {
  sourceOnly?: boolean;
  targetOnly?: boolean;
  /** Comma separated `schema.table` entries; overrides TARGET_TABLES */
  tables?: string;
  verbose?: boolean;
}

export interface PreflightCheckDependencies {
  config?: AppConfig;
  createDataSource?: (name: string, config: DatabaseConfig) => PipelineDataSource;
  logger?: Logger;
}

export type CheckSide = 'source' | 'target';

export interface CheckOutcome {
  side: CheckSide;
  dataSource: string;
  databaseType: string;
  passed: boolean;
  durationMs: number;
  errorCode?: string;
  message?: string;
}

export interface PreflightCheckResult {
  passed: boolean;
  correlationId: string;
  checks: CheckOutcome[];
  errorCode?: string;
  message?: string;
}

function describeError(error: unknown): { errorCode: string; message: string } {
  if (error instanceof PreflightBaseError) {
    return { errorCode: error.errorCode, message: error.message };
  }
  return {
    errorCode: 'UNKNOWN_ERROR',
    message: error instanceof Error ? error.message : String(error)
  };
}

function loadConfig(dependencies: PreflightCheckDependencies): AppConfig {
  try {
    const cfg = dependencies.config ?? getConfig();
    validateConfig(cfg);
    return cfg;
  } catch (error) {
    throw new ConfigurationError(error instanceof Error ? error.message : String(error), {}, error);
  }
}

/**
 * Runs the source checks, then the target checks. Failures are returned, not thrown.
 */
export async function runPreflightCheck(
  options: PreflightCheckOptions = {},
  dependencies: PreflightCheckDependencies = {}
): Promise<PreflightCheckResult> {
  const correlationId = generateCorrelationId();
  const logger = dependencies.logger ?? getLogger();
  const buildDataSource = dependencies.createDataSource ?? createDataSource;
  const checks: CheckOutcome[] = [];

  logger.setCorrelationId(correlationId);

  try {
    if (options.sourceOnly && options.targetOnly) {
      throw new ConfigurationError('--source-only and --target-only cannot be combined');
    }

    const cfg = loadConfig(dependencies);
    if (logger.isLevelEnabled(LogLevel.DEBUG)) {
      logger.debug('Pre-flight configuration', getConfigForLogging(cfg));
    }
    const tables = options.tables !== undefined ? parseList(options.tables) : cfg.targetTables;
    const sides: CheckSide[] = [];
    if (!options.targetOnly) sides.push('source');
    if (!options.sourceOnly) sides.push('target');

    if (sides.includes('target') && tables.length === 0) {
      throw new ConfigurationError('No target tables configured; set TARGET_TABLES or pass --tables');
    }
    const importerConfig = sides.includes('target') ? createImporterConfiguration(tables) : undefined;

    for (const side of sides) {
      const dbConfig = side === 'source' ? cfg.source : cfg.target;
      const engine = new DataSourceCheckEngine(getDatabaseType(dbConfig.type), { logger });
      const dataSource = buildDataSource(side, dbConfig);
      const startTime = Date.now();

      logger.info(`Checking ${side} data source`, {
        connection: getMaskedConnectionString(dbConfig)
      });

      try {
        if (importerConfig && side === 'target') {
          await engine.checkTargetDataSource(dataSource, importerConfig);
        } else {
          await engine.checkSourceDataSource(dataSource);
        }
        checks.push({
          side,
          dataSource: getMaskedConnectionString(dbConfig),
          databaseType: engine.databaseType.name,
          passed: true,
          durationMs: Date.now() - startTime
        });
      } catch (error) {
        const { errorCode, message } = describeError(error);
        checks.push({
          side,
          dataSource: getMaskedConnectionString(dbConfig),
          databaseType: engine.databaseType.name,
          passed: false,
          durationMs: Date.now() - startTime,
          errorCode,
          message
        });
        return { passed: false, correlationId, checks, errorCode, message };
      } finally {
        await closeDataSource(dataSource);
      }
    }

    return { passed: true, correlationId, checks };
  } catch (error) {
    logger.error('Pre-flight check could not run', error);
    return { passed: false, correlationId, checks, ...describeError(error) };
  } finally {
    logger.clearContext();
  }
}

function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}

/**
 * Human readable report lines, without colour
 */
export function formatReport(result: PreflightCheckResult): string[] {
  const lines = result.checks.map(check => {
    const status = check.passed ? 'PASS' : 'FAIL';
    const detail = check.passed ? '' : ` - ${check.errorCode}: ${check.message}`;
    return `${status} ${check.side} (${check.databaseType}) ${check.dataSource} [${formatDuration(check.durationMs)}]${detail}`;
  });

  if (result.checks.length === 0 && !result.passed) {
    lines.push(`FAIL ${result.errorCode}: ${result.message}`);
  }
  lines.push(result.passed ? 'Pre-flight checks passed' : 'Pre-flight checks failed');
  return lines;
}

function printReport(result: PreflightCheckResult): void {
  for (const line of formatReport(result)) {
    if (line.startsWith('PASS') || line === 'Pre-flight checks passed') {
      console.log(chalk.green(line));
    } else {
      console.log(chalk.red(line));
    }
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('preflight-check')
    .description('Validate source and target data sources before a migration job starts')
    .version(VERSION)
    .option('--source-only', 'Check the source data source only')
    .option('--target-only', 'Check the target data source only')
    .option('-t, --tables <list>', 'Comma separated schema.table entries the job will populate')
    .option('--verbose', 'Log every check at debug level')
    .action(async (options: PreflightCheckOptions) => {
      const logger = options.verbose ? initializeLogging({ level: LogLevel.DEBUG }) : getLogger();
      const result = await runPreflightCheck(options, { logger });
      printReport(result);
      process.exitCode = result.passed ? 0 : 1;
    });

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch(error => {
      console.error(chalk.red(`Pre-flight check crashed: ${error instanceof Error ? error.message : String(error)}`));
      process.exit(1);
    });
}
