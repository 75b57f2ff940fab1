/**
 * Error Taxonomy and Logging Infrastructure
 *
 * Pre-flight checks raise exactly one typed error for the first violated
 * precondition. Callers switch on the class or on {@link PreflightBaseError.errorCode}
 * to tell "cannot connect" from "target not empty" from a dialect diagnosis.
 */

import * as fs from 'fs';
import * as path from 'path';
import { getLoggingConfig } from './environment-config';

// ===== ERROR CLASSIFICATION =====

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

export enum ErrorCategory {
  CONNECTION = 'connection',
  TARGET_TABLE = 'target_table',
  DIALECT = 'dialect',
  CONFIGURATION = 'configuration'
}

// ===== CUSTOM ERROR CLASSES =====

export class PreflightBaseError extends Error {
  public readonly errorCode: string;
  public readonly category: ErrorCategory;
  public readonly severity: ErrorSeverity;
  public readonly context: Record<string, unknown>;
  public readonly timestamp: Date;

  constructor(
    message: string,
    errorCode: string,
    category: ErrorCategory,
    severity: ErrorSeverity = ErrorSeverity.HIGH,
    context: Record<string, unknown> = {},
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.category = category;
    this.severity = severity;
    this.context = context;
    this.timestamp = new Date();

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert to structured log format
   */
  toLogFormat(): LogEntry {
    return {
      timestamp: this.timestamp,
      level: LogLevel.ERROR,
      message: this.message,
      error_code: this.errorCode,
      category: this.category,
      severity: this.severity,
      context: this.context,
      cause: describeCause(this.cause),
      stack_trace: this.stack
    };
  }
}

function describeCause(cause: unknown): string | undefined {
  if (cause === undefined) {
    return undefined;
  }
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * A connection could not be acquired, or a statement failed on it.
 */
export class InvalidConnectionError extends PreflightBaseError {
  constructor(cause: unknown, context: Record<string, unknown> = {}) {
    super(
      `Data source connection is invalid: ${describeCause(cause) ?? 'unknown error'}`,
      'PREPARE_JOB_INVALID_CONNECTION',
      ErrorCategory.CONNECTION,
      ErrorSeverity.CRITICAL,
      context,
      cause
    );
  }
}

export class TargetTableNotEmptyError extends PreflightBaseError {
  public readonly tableName: string;

  constructor(tableName: string, context: Record<string, unknown> = {}) {
    super(
      `Target table \`${tableName}\` is not empty`,
      'PREPARE_JOB_TARGET_TABLE_NOT_EMPTY',
      ErrorCategory.TARGET_TABLE,
      ErrorSeverity.HIGH,
      { table_name: tableName, ...context }
    );
    this.tableName = tableName;
  }
}

/**
 * Base for failures raised by a dialect's privilege or variable check.
 * The engine passes these through unmodified.
 */
export class DialectCheckError extends PreflightBaseError {
  constructor(
    message: string,
    errorCode: string,
    context: Record<string, unknown> = {},
    cause?: unknown
  ) {
    super(message, errorCode, ErrorCategory.DIALECT, ErrorSeverity.HIGH, context, cause);
  }
}

export class InsufficientPrivilegeError extends DialectCheckError {
  public readonly requiredPrivileges: string[];

  constructor(requiredPrivileges: string[], context: Record<string, unknown> = {}) {
    super(
      `Source data source lacks required privileges: ${requiredPrivileges.join(', ')}`,
      'PREPARE_JOB_INSUFFICIENT_PRIVILEGE',
      { required_privileges: requiredPrivileges, ...context }
    );
    this.requiredPrivileges = requiredPrivileges;
  }
}

export class PrivilegeCheckFailedError extends DialectCheckError {
  constructor(cause: unknown, context: Record<string, unknown> = {}) {
    super(
      `Source data source privilege check failed: ${describeCause(cause) ?? 'unknown error'}`,
      'PREPARE_JOB_PRIVILEGE_CHECK_FAILED',
      context,
      cause
    );
  }
}

export class UserNotFoundError extends DialectCheckError {
  public readonly user: string;

  constructor(user: string, context: Record<string, unknown> = {}) {
    super(
      `Source data source user \`${user}\` does not exist`,
      'PREPARE_JOB_USER_NOT_FOUND',
      { user, ...context }
    );
    this.user = user;
  }
}

export class InvalidVariableError extends DialectCheckError {
  public readonly variableName: string;
  public readonly expectedValue: string;
  public readonly actualValue: string;

  constructor(variableName: string, expectedValue: string, actualValue: string, context: Record<string, unknown> = {}) {
    super(
      `Source data source required \`${variableName} = ${expectedValue}\`, now is \`${actualValue}\``,
      'PREPARE_JOB_INVALID_VARIABLE',
      { variable_name: variableName, expected_value: expectedValue, actual_value: actualValue, ...context }
    );
    this.variableName = variableName;
    this.expectedValue = expectedValue;
    this.actualValue = actualValue;
  }
}

export class VariableCheckFailedError extends DialectCheckError {
  constructor(cause: unknown, context: Record<string, unknown> = {}) {
    super(
      `Source data source variable check failed: ${describeCause(cause) ?? 'unknown error'}`,
      'PREPARE_JOB_VARIABLE_CHECK_FAILED',
      context,
      cause
    );
  }
}

export class ConfigurationError extends PreflightBaseError {
  constructor(message: string, context: Record<string, unknown> = {}, cause?: unknown) {
    super(message, 'CONFIG_ERROR', ErrorCategory.CONFIGURATION, ErrorSeverity.CRITICAL, context, cause);
  }
}

// ===== LOGGING INFRASTRUCTURE =====

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  error_code?: string;
  category?: ErrorCategory;
  severity?: ErrorSeverity;
  cause?: string;
  stack_trace?: string;
  correlation_id?: string;
}

export interface LoggerConfig {
  level: LogLevel;
  enableConsole: boolean;
  enableFile: boolean;
  logDirectory: string;
  enableStructuredLogging: boolean;
}

const LEVEL_ORDER = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

export class Logger {
  private config: LoggerConfig;
  private correlationId: string | null = null;
  private currentLogFile: string | null = null;

  constructor(config?: Partial<LoggerConfig>) {
    const loggingConfig = getLoggingConfig();

    this.config = {
      level: Logger.parseLogLevel(loggingConfig.level),
      enableConsole: true,
      enableFile: loggingConfig.enableFileLogging,
      logDirectory: loggingConfig.logDirectory,
      enableStructuredLogging: loggingConfig.format === 'json',
      ...config
    };

    this.ensureLogDirectory();
    this.initializeLogFile();
  }

  /**
   * Set correlation ID for request tracing
   */
  setCorrelationId(correlationId: string): void {
    this.correlationId = correlationId;
  }

  clearContext(): void {
    this.correlationId = null;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, context);
  }

  /**
   * Log error message; typed pre-flight errors contribute their structured fields
   */
  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    if (!this.shouldLog(LogLevel.ERROR)) {
      return;
    }

    if (error instanceof PreflightBaseError) {
      this.writeLogEntry({
        ...error.toLogFormat(),
        timestamp: new Date(),
        message,
        context: { ...context, ...error.context, error_message: error.message },
        correlation_id: this.correlationId ?? undefined
      });
      return;
    }

    const errorContext = error instanceof Error
      ? { ...context, error_message: error.message, stack_trace: error.stack }
      : { ...context, error_message: error === undefined ? undefined : String(error) };
    this.log(LogLevel.ERROR, message, errorContext);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return this.shouldLog(level);
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) {
      return;
    }

    this.writeLogEntry({
      timestamp: new Date(),
      level,
      message,
      context,
      correlation_id: this.correlationId ?? undefined
    });
  }

  private writeLogEntry(entry: LogEntry): void {
    const formattedEntry = this.formatLogEntry(entry);

    if (this.config.enableConsole) {
      this.writeToConsole(entry.level, formattedEntry);
    }

    if (this.config.enableFile) {
      this.writeToFile(formattedEntry);
    }
  }

  /**
   * Format log entry based on configuration
   */
  formatLogEntry(entry: LogEntry): string {
    if (this.config.enableStructuredLogging) {
      return JSON.stringify({
        ...entry,
        timestamp: entry.timestamp.toISOString()
      });
    }

    const timestamp = entry.timestamp.toISOString();
    const level = entry.level.toUpperCase().padEnd(5);
    const correlation = entry.correlation_id ? `[${entry.correlation_id}] ` : '';
    const code = entry.error_code ? `${entry.error_code} ` : '';
    const context = entry.context && Object.keys(entry.context).length > 0 ? ` ${JSON.stringify(entry.context)}` : '';

    return `${timestamp} ${level} ${correlation}${code}${entry.message}${context}`;
  }

  private writeToConsole(level: LogLevel, message: string): void {
    switch (level) {
      case LogLevel.DEBUG:
        console.debug(message);
        break;
      case LogLevel.INFO:
        console.info(message);
        break;
      case LogLevel.WARN:
        console.warn(message);
        break;
      case LogLevel.ERROR:
        console.error(message);
        break;
    }
  }

  private writeToFile(message: string): void {
    if (!this.currentLogFile) {
      return;
    }

    try {
      fs.appendFileSync(this.currentLogFile, message + '\n');
    } catch (error) {
      console.error('Failed to write to log file:', error);
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.config.level);
  }

  /**
   * Parse log level from string
   */
  static parseLogLevel(level: string): LogLevel {
    switch (level.toLowerCase()) {
      case 'debug':
        return LogLevel.DEBUG;
      case 'info':
        return LogLevel.INFO;
      case 'warn':
      case 'warning':
        return LogLevel.WARN;
      case 'error':
        return LogLevel.ERROR;
      default:
        return LogLevel.INFO;
    }
  }

  private ensureLogDirectory(): void {
    if (!this.config.enableFile) {
      return;
    }

    try {
      if (!fs.existsSync(this.config.logDirectory)) {
        fs.mkdirSync(this.config.logDirectory, { recursive: true });
      }
    } catch (error) {
      console.error('Failed to create log directory:', error);
      this.config.enableFile = false;
    }
  }

  private initializeLogFile(): void {
    if (!this.config.enableFile) {
      return;
    }

    const timestamp = new Date().toISOString().split('T')[0]; // YYYY-MM-DD
    this.currentLogFile = path.join(this.config.logDirectory, `preflight-${timestamp}.log`);
  }
}

// ===== SINGLETON INSTANCES =====

let globalLogger: Logger | null = null;

/**
 * Get global logger instance
 */
export function getLogger(): Logger {
  if (!globalLogger) {
    globalLogger = new Logger();
  }
  return globalLogger;
}

/**
 * Replace the global logger with one built from the given configuration
 */
export function initializeLogging(loggerConfig?: Partial<LoggerConfig>): Logger {
  globalLogger = new Logger(loggerConfig);
  return globalLogger;
}

// ===== UTILITY FUNCTIONS =====

/**
 * Generate correlation ID for request tracing
 */
export function generateCorrelationId(): string {
  return `${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;
}
