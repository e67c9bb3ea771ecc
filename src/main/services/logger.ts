/**
 * Tagged logger: structured logging with a per-service tag.
 *
 * Everything goes to stderr: stdout belongs to command output (`cliplog list`,
 * the history view).
 *
 * Usage:
 *   const log = createLogger('HistoryStore');
 *   log.info('Opened database');
 *   log.warn('Retrying...', { attempt: 3 });
 *   log.error('Append failed', err);
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/** Global log level: can be adjusted at runtime */
let globalLogLevel: LogLevel = 'info';

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function setLogLevel(level: LogLevel): void {
  globalLogLevel = level;
}

export function getLogLevel(): LogLevel {
  return globalLogLevel;
}

/**
 * Create a tagged logger for a specific service/module.
 *
 * @param tag - Service/module name (e.g. 'ClipboardWatcher', 'Lifecycle')
 */
export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;

  const shouldLog = (level: LogLevel): boolean => {
    return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[globalLogLevel];
  };

  const write = (level: LogLevel, message: string, args: unknown[]) => {
    if (!shouldLog(level)) return;
    console.error(new Date().toISOString(), level.toUpperCase().padEnd(5), prefix, message, ...args);
  };

  return {
    debug(message: string, ...args: unknown[]) {
      write('debug', message, args);
    },
    info(message: string, ...args: unknown[]) {
      write('info', message, args);
    },
    warn(message: string, ...args: unknown[]) {
      write('warn', message, args);
    },
    error(message: string, ...args: unknown[]) {
      write('error', message, args);
    },
  };
}
