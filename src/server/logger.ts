/**
 * Logging adapter used across the relay. Each call carries a context
 * ("lifecycle", "ws", "dispatch", ...) that ends up as the line prefix.
 */
export interface Logger {
  debug(context: string, message: string, data?: unknown): void;
  info(context: string, message: string, data?: unknown): void;
  warn(context: string, message: string, data?: unknown): void;
  error(context: string, message: string, data?: unknown): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const rank: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

export function createConsoleLogger(level: LogLevel = 'info'): Logger {
  const enabled = (l: Exclude<LogLevel, 'silent'>) => rank[l] >= rank[level];
  const line = (context: string, message: string) => `[${context}] ${message}`;
  const args = (context: string, message: string, data: unknown): unknown[] =>
    data === undefined ? [line(context, message)] : [line(context, message), data];

  /* eslint-disable no-console */
  return {
    debug(context, message, data) {
      if (enabled('debug')) console.debug(...args(context, message, data));
    },
    info(context, message, data) {
      if (enabled('info')) console.log(...args(context, message, data));
    },
    warn(context, message, data) {
      if (enabled('warn')) console.warn(...args(context, message, data));
    },
    error(context, message, data) {
      if (enabled('error')) console.error(...args(context, message, data));
    }
  };
  /* eslint-enable no-console */
}

export const silentLogger: Logger = createConsoleLogger('silent');
