/**
 * wirekit - Logger port
 */

/**
 * Logger interface accepted by the container
 */
export interface ILogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const noop = (): void => undefined;

/**
 * Creates a console logger that drops messages below `level`.
 *
 * @example
 * ```typescript
 * // show every binding write and auto-wiring step
 * const container = new Container({ logger: createConsoleLogger('debug') });
 * ```
 */
export function createConsoleLogger(level: LogLevel = 'info'): ILogger {
  const enabled = (candidate: LogLevel): boolean =>
    LEVEL_ORDER[candidate] >= LEVEL_ORDER[level];

  return {
    debug: enabled('debug')
      ? (message, ...args) => console.debug(`[DEBUG] ${message}`, ...args)
      : noop,
    info: enabled('info')
      ? (message, ...args) => console.info(`[INFO] ${message}`, ...args)
      : noop,
    warn: enabled('warn')
      ? (message, ...args) => console.warn(`[WARN] ${message}`, ...args)
      : noop,
    error: (message, ...args) => console.error(`[ERROR] ${message}`, ...args),
  };
}

/**
 * Default console logger, at info level
 */
export const consoleLogger: ILogger = createConsoleLogger('info');

/**
 * Logger that discards everything
 */
export const silentLogger: ILogger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};
