/**
 * Universal Logger Interface
 * Compatible with Pino, Winston, console, and custom loggers
 */

/**
 * Logger interface that works with popular logging libraries
 *
 * @example Pino
 * ```typescript
 * import pino from 'pino';
 * const logger = fromPino(pino({ level: 'debug' }));
 * const retriever = new Retriever({ embedder, backend, logger });
 * ```
 *
 * @example Console
 * ```typescript
 * const retriever = new Retriever({ embedder, backend, logger: consoleLogger });
 * ```
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  debug(obj: object, message?: string, ...args: unknown[]): void;

  info(message: string, ...args: unknown[]): void;
  info(obj: object, message?: string, ...args: unknown[]): void;

  warn(message: string, ...args: unknown[]): void;
  warn(obj: object, message?: string, ...args: unknown[]): void;

  error(message: string, ...args: unknown[]): void;
  error(obj: object, message?: string, ...args: unknown[]): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

type LogMethod = (msgOrObj: string | object, ...args: unknown[]) => void;

/**
 * Console adapter - wraps console to match Logger interface
 */
export const consoleLogger: Logger = {
  debug: (msgOrObj: string | object, ...args: unknown[]) => console.debug(msgOrObj, ...args),
  info: (msgOrObj: string | object, ...args: unknown[]) => console.info(msgOrObj, ...args),
  warn: (msgOrObj: string | object, ...args: unknown[]) => console.warn(msgOrObj, ...args),
  error: (msgOrObj: string | object, ...args: unknown[]) => console.error(msgOrObj, ...args),
};

/**
 * Silent logger - no output.
 * Default for library classes; pass a real logger to see what happens.
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

const levels: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

/**
 * Create a logger that only logs at or above the specified level
 */
export function createLevelLogger(baseLogger: Logger, minLevel: LogLevel): Logger {
  const minLevelNum = levels[minLevel];

  const gate = (level: LogLevel, method: LogMethod): LogMethod => {
    return (msgOrObj, ...args) => {
      if (levels[level] >= minLevelNum) {
        method(msgOrObj, ...args);
      }
    };
  };

  return {
    debug: gate('debug', (msgOrObj, ...args) => forward(baseLogger, 'debug', msgOrObj, args)),
    info: gate('info', (msgOrObj, ...args) => forward(baseLogger, 'info', msgOrObj, args)),
    warn: gate('warn', (msgOrObj, ...args) => forward(baseLogger, 'warn', msgOrObj, args)),
    error: gate('error', (msgOrObj, ...args) => forward(baseLogger, 'error', msgOrObj, args)),
  };
}

function forward(logger: Logger, level: LogLevel, msgOrObj: string | object, args: unknown[]): void {
  if (typeof msgOrObj === 'string') {
    logger[level](msgOrObj, ...args);
    return;
  }
  const [message, ...rest] = args;
  logger[level](msgOrObj, typeof message === 'string' ? message : undefined, ...rest);
}
