import pino, { type Logger as PinoLogger } from 'pino';
import type { Logger, LogLevel } from '../types/logger.js';

/**
 * Adapt a pino logger to the library Logger interface.
 * Only the first trailing argument is kept, as the message.
 */
export function fromPino(base: PinoLogger): Logger {
  const method = (level: LogLevel) => (msgOrObj: string | object, ...args: unknown[]): void => {
    if (typeof msgOrObj === 'string') {
      base[level](msgOrObj);
      return;
    }
    const [message] = args;
    base[level](msgOrObj, typeof message === 'string' ? message : undefined);
  };

  return {
    debug: method('debug'),
    info: method('info'),
    warn: method('warn'),
    error: method('error'),
  };
}

/**
 * pino logger writing JSON lines to stderr, keeping stdout for command output.
 */
export function createCliLogger(level: LogLevel): Logger {
  return fromPino(pino({ name: 'hybrid-rag', level }, pino.destination(2)));
}
