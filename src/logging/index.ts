/**
 * Structured logging API.
 *
 * Thin layer over pino that keeps the `(message, fields)` call shape used
 * across the codebase. Output goes to stderr so that stdout belongs to the
 * loaded module.
 *
 * Level comes from `MODSOURCE_LOG_LEVEL` (default "warn"). Setting
 * `MODSOURCE_ENV=development` switches to the pino-pretty transport.
 */

import pino, { type Logger, type LoggerOptions } from 'pino';
import { type LogLevel, loadConfig } from '../config/index.js';

/**
 * Structured logging fields.
 *
 * Common fields include:
 * - component: Subsystem identifier (e.g., "searcher-chain", "dispatch")
 * - operation: Operation being performed (e.g., "resolve")
 * - module_name: Module name being resolved
 * - searcher: Searcher strategy name
 */
export interface LogFields {
  [key: string]: string | number | boolean | null | undefined;
}

let rootLogger: Logger | null = null;

function buildRootLogger(): Logger {
  const config = loadConfig();
  const options: LoggerOptions = {
    name: 'modsource',
    level: config.logLevel,
  };

  if (config.environment === 'development') {
    options.transport = {
      target: 'pino-pretty',
      options: { colorize: true, destination: 2 },
    };
    return pino(options);
  }

  return pino(options, pino.destination({ dest: 2, sync: true }));
}

/**
 * Get the process-wide root logger, creating it on first use.
 */
export function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = buildRootLogger();
  }
  return rootLogger;
}

/**
 * Replace the root logger (tests use this to capture output).
 *
 * @internal
 */
export function setRootLogger(logger: Logger | null): void {
  rootLogger = logger;
}

/**
 * Change the level of the root logger at runtime.
 */
export function setLogLevel(level: LogLevel): void {
  getRootLogger().level = level;
}

function withoutUndefined(fields?: LogFields): Record<string, string | number | boolean | null> {
  const result: Record<string, string | number | boolean | null> = {};
  if (!fields) {
    return result;
  }
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Log an ERROR level message with structured fields.
 */
export function logError(message: string, fields?: LogFields): void {
  getRootLogger().error(withoutUndefined(fields), message);
}

/**
 * Log a WARN level message with structured fields.
 */
export function logWarn(message: string, fields?: LogFields): void {
  getRootLogger().warn(withoutUndefined(fields), message);
}

/**
 * Log an INFO level message with structured fields.
 */
export function logInfo(message: string, fields?: LogFields): void {
  getRootLogger().info(withoutUndefined(fields), message);
}

/**
 * Log a DEBUG level message with structured fields.
 *
 * @example
 * logDebug('Candidate rejected', {
 *   component: 'default-searcher',
 *   path: './lib/util.js',
 * });
 */
export function logDebug(message: string, fields?: LogFields): void {
  getRootLogger().debug(withoutUndefined(fields), message);
}

/**
 * Log a TRACE level message with structured fields.
 */
export function logTrace(message: string, fields?: LogFields): void {
  getRootLogger().trace(withoutUndefined(fields), message);
}

/**
 * Component logger returned by {@link createLogger}.
 */
export interface ComponentLogger {
  error(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  debug(message: string, fields?: LogFields): void;
  trace(message: string, fields?: LogFields): void;
}

/**
 * Create a logger with preset fields.
 *
 * @example
 * const logger = createLogger({ component: 'dispatch' });
 * logger.info('Module loaded', { module_name: 'util' });
 * // Logs: { component: 'dispatch', module_name: 'util' }
 */
export function createLogger(defaultFields: LogFields): ComponentLogger {
  const mergeFields = (fields?: LogFields): LogFields => ({
    ...defaultFields,
    ...fields,
  });

  return {
    error: (message, fields) => logError(message, mergeFields(fields)),
    warn: (message, fields) => logWarn(message, mergeFields(fields)),
    info: (message, fields) => logInfo(message, mergeFields(fields)),
    debug: (message, fields) => logDebug(message, mergeFields(fields)),
    trace: (message, fields) => logTrace(message, mergeFields(fields)),
  };
}
