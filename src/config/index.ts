/**
 * Environment-driven configuration.
 *
 * Environment Variables:
 *   MODSOURCE_HOME        - User module directory (default: ~/.local/share/modsource)
 *   MODSOURCE_PATH        - ':'-separated extra templates, searched before the defaults
 *   MODSOURCE_EXTENSIONS  - ','-separated extensions tried after the bare name (default: .js,.mjs)
 *   MODSOURCE_LOG_LEVEL   - trace, debug, info, warn, error, fatal, silent (default: warn)
 *   MODSOURCE_ENV         - development, test, production (default: production)
 */

import { homedir } from 'node:os';
import { join } from 'node:path';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export type Environment = 'development' | 'test' | 'production';

/**
 * Resolved configuration.
 */
export interface ModsourceConfig {
  /** Directory holding user-installed modules. */
  userModuleDir: string;

  /** Extra template strings placed ahead of the default search path. */
  extraSearchPath: string[];

  /** Extensions tried after the bare name, in order. */
  extensions: string[];

  logLevel: LogLevel;

  environment: Environment;
}

export const DEFAULT_EXTENSIONS: readonly string[] = ['.js', '.mjs'];

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

const ENVIRONMENTS: readonly Environment[] = ['development', 'test', 'production'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function isEnvironment(value: string): value is Environment {
  return ENVIRONMENTS.some((environment) => environment === value);
}

/**
 * Default user module directory for a given home directory.
 */
export function defaultUserModuleDir(home: string = homedir()): string {
  return join(home, '.local', 'share', 'modsource');
}

function splitList(value: string | undefined, separator: string): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(separator)
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

/**
 * Read configuration from an environment map.
 *
 * Unknown log levels and environments fall back to their defaults rather
 * than failing; template strings are validated later, when they are parsed
 * into the search path.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ModsourceConfig {
  const logLevel = env.MODSOURCE_LOG_LEVEL?.trim().toLowerCase() ?? '';
  const environment = env.MODSOURCE_ENV?.trim().toLowerCase() ?? '';
  const extensions = splitList(env.MODSOURCE_EXTENSIONS, ',');

  return {
    userModuleDir: env.MODSOURCE_HOME?.trim() || defaultUserModuleDir(),
    extraSearchPath: splitList(env.MODSOURCE_PATH, ':'),
    extensions: extensions.length > 0 ? extensions : [...DEFAULT_EXTENSIONS],
    logLevel: isLogLevel(logLevel) ? logLevel : 'warn',
    environment: isEnvironment(environment) ? environment : 'production',
  };
}
