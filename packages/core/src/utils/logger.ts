/**
 * Logger Utility
 *
 * Level-filtered console logging with a `[scope]` prefix per component.
 * The minimum level comes from the LOG_LEVEL environment variable
 * (DEBUG|INFO|WARNING|ERROR, default INFO) and is read on every call.
 *
 *   const logger = createLogger('write-router');
 *   logger.debug('update pages[5] in draft 3');
 *   logger.child('embedded').info('linked 2 children');
 *   // [write-router:embedded] linked 2 children
 *
 * @module
 */

// ============================================================================
// Types
// ============================================================================

export type LogLevel = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR';

export interface Logger {
  readonly scope: string;
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  /** Logger for a sub-component, prefixed `[scope:name]` */
  child(name: string): Logger;
}

// ============================================================================
// Level Resolution
// ============================================================================

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARNING: 2,
  ERROR: 3,
};

const DEFAULT_LOG_LEVEL: LogLevel = 'INFO';

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_VALUES;
}

/**
 * Resolves the minimum level from LOG_LEVEL, falling back to INFO when the
 * variable is unset or holds something else.
 */
export function getLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toUpperCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return DEFAULT_LOG_LEVEL;
}

function shouldLog(messageLevel: LogLevel): boolean {
  return LOG_LEVEL_VALUES[messageLevel] >= LOG_LEVEL_VALUES[getLogLevel()];
}

// ============================================================================
// Logger Factory
// ============================================================================

type ConsoleMethod = (...data: unknown[]) => void;

function emit(level: LogLevel, write: ConsoleMethod, prefix: string, message: string, args: unknown[]): void {
  if (!shouldLog(level)) {
    return;
  }
  write(prefix, message, ...args);
}

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;

  return {
    scope,
    debug(message: string, ...args: unknown[]): void {
      emit('DEBUG', console.debug, prefix, message, args);
    },
    info(message: string, ...args: unknown[]): void {
      emit('INFO', console.log, prefix, message, args);
    },
    warn(message: string, ...args: unknown[]): void {
      emit('WARNING', console.warn, prefix, message, args);
    },
    error(message: string, ...args: unknown[]): void {
      emit('ERROR', console.error, prefix, message, args);
    },
    child(name: string): Logger {
      return createLogger(`${scope}:${name}`);
    },
  };
}
