/**
 * Logging collaborator
 *
 * The engines only ever call `log(level, message)` on an injected sink.
 * Nothing is printed unless a sink is passed in.
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'trace'];

const severity: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

/**
 * Sink accepted by the exchange and discovery engines
 *
 * @example Custom sink
 * ```typescript
 * const sink: LogSink = {
 *   log: (level, message) => myCustomLog(level.toUpperCase(), message),
 * };
 * const client = createClient({ logger: sink });
 * ```
 */
export interface LogSink {
  log(level: LogLevel, message: string): void;
}

/**
 * Logger interface that works with popular logging libraries
 *
 * @example Pino
 * ```typescript
 * import pino from 'pino';
 * const client = createClient({ logger: fromLogger(pino({ level: 'debug' })) });
 * ```
 *
 * @example Winston
 * ```typescript
 * import winston from 'winston';
 * const client = createClient({ logger: fromLogger(winston.createLogger({ level: 'debug' })) });
 * ```
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  trace?(message: string, ...args: unknown[]): void;
}

/**
 * Silent sink - no output
 * Default for every engine
 */
export const silentLogger: LogSink = {
  log: () => {},
};

export function isEnabled(level: LogLevel, minLevel: LogLevel): boolean {
  return severity[level] <= severity[minLevel];
}

/**
 * Drop everything more verbose than `minLevel` before it reaches `sink`
 */
export function createLevelLogger(sink: LogSink, minLevel: LogLevel): LogSink {
  return {
    log: (level, message) => {
      if (isEnabled(level, minLevel)) {
        sink.log(level, message);
      }
    },
  };
}

/**
 * Console sink, `[LEVEL] message` per line
 */
export function consoleLogger(minLevel: LogLevel = 'info'): LogSink {
  return createLevelLogger(
    {
      log: (level, message) => {
        const line = `[${level.toUpperCase()}] ${message}`;
        if (level === 'error') {
          console.error(line);
        } else if (level === 'warn') {
          console.warn(line);
        } else {
          console.log(line);
        }
      },
    },
    minLevel
  );
}

/**
 * Adapt a Pino/Winston/console style logger.
 * Loggers without `trace` receive trace messages at debug.
 */
export function fromLogger(logger: Logger, minLevel: LogLevel = 'trace'): LogSink {
  return createLevelLogger(
    {
      log: (level, message) => {
        switch (level) {
          case 'error':
            logger.error(message);
            break;
          case 'warn':
            logger.warn(message);
            break;
          case 'info':
            logger.info(message);
            break;
          case 'debug':
            logger.debug(message);
            break;
          case 'trace':
            if (logger.trace) {
              logger.trace(message);
            } else {
              logger.debug(message);
            }
            break;
        }
      },
    },
    minLevel
  );
}
