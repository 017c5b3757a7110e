export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let globalLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel) {
  globalLevel = level;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/**
 * Console logger that prefixes every line with `[COMPONENT]`.
 * An explicit level overrides the process-wide one set by `setLogLevel`.
 */
export function createLogger(component: string, level?: LogLevel): Logger {
  const prefix = `[${component.toUpperCase()}]`;
  const enabled = (target: LogLevel) => LEVEL_ORDER[target] >= LEVEL_ORDER[level ?? globalLevel];

  return {
    debug: (message, ...args) => {
      if (enabled('debug')) console.debug(`${prefix} ${message}`, ...args);
    },
    info: (message, ...args) => {
      if (enabled('info')) console.log(`${prefix} ${message}`, ...args);
    },
    warn: (message, ...args) => {
      if (enabled('warn')) console.warn(`${prefix} ${message}`, ...args);
    },
    error: (message, ...args) => {
      if (enabled('error')) console.error(`${prefix} ${message}`, ...args);
    },
  };
}

export const silentLogger: Logger = createLogger('silent', 'silent');
