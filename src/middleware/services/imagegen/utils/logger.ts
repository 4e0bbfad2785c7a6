/**
 * Provider Logger
 *
 * Console logging with a global minimum level shared by all providers.
 * Set via IMAGEGEN_LOG_LEVEL environment variable or setLogLevel().
 */

import { LogLevel, LOG_LEVEL_PRIORITY, isLogLevel } from '../../../types';

function levelFromEnv(): LogLevel {
  const value = process.env.IMAGEGEN_LOG_LEVEL?.toLowerCase().trim();
  return value && isLogLevel(value) ? value : 'info';
}

let globalLogLevel: LogLevel = levelFromEnv();

/**
 * Set the global log level for all image providers
 */
export function setLogLevel(level: LogLevel): void {
  globalLogLevel = level;
}

/**
 * Get the current global log level
 */
export function getLogLevel(): LogLevel {
  return globalLogLevel;
}

type ConsoleLevel = Exclude<LogLevel, 'silent'>;

export class ProviderLogger {
  constructor(private readonly scope: string) {}

  debug(message: string, meta?: Record<string, unknown>): void {
    this.write('debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.write('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.write('warn', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.write('error', message, meta);
  }

  log(level: ConsoleLevel, message: string, meta?: Record<string, unknown>): void {
    this.write(level, message, meta);
  }

  private write(level: ConsoleLevel, message: string, meta?: Record<string, unknown>): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[globalLogLevel]) {
      return;
    }

    const timestamp = new Date().toISOString();
    const prefix = `[${timestamp}] [${this.scope.toUpperCase()}] [${level.toUpperCase()}]`;

    if (meta) {
      console[level](prefix, message, meta);
    } else {
      console[level](prefix, message);
    }
  }
}
