/**
 * Logger interface accepted by every parser option bag
 * Compatible with Pino, Winston, console, and custom loggers
 *
 * @example Pino
 * ```typescript
 * import pino from 'pino';
 * const accept = parseAccept(header, { logger: pino({ level: 'debug' }) });
 * ```
 *
 * @example Console
 * ```typescript
 * const parser = createHeaderParser({ logger: consoleLogger });
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

/**
 * Console adapter - wraps console to match Logger interface
 */
export const consoleLogger: Logger = {
  debug: (msgOrObj: string | object, ...args: unknown[]) => {
    console.debug(msgOrObj, ...args);
  },
  info: (msgOrObj: string | object, ...args: unknown[]) => {
    console.info(msgOrObj, ...args);
  },
  warn: (msgOrObj: string | object, ...args: unknown[]) => {
    console.warn(msgOrObj, ...args);
  },
  error: (msgOrObj: string | object, ...args: unknown[]) => {
    console.error(msgOrObj, ...args);
  },
};

/**
 * Silent logger - no output
 * Default for every parser
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export function isLogger(value: unknown): value is Logger {
  return (
    typeof value === 'object' &&
    value !== null &&
    'debug' in value && typeof value.debug === 'function' &&
    'info' in value && typeof value.info === 'function' &&
    'warn' in value && typeof value.warn === 'function' &&
    'error' in value && typeof value.error === 'function'
  );
}
