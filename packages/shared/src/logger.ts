import pino, { stdTimeFunctions, type DestinationStream, type Logger, type LoggerOptions } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export interface ServiceLogger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string | Error, meta?: Record<string, unknown>): void;
}

export const noopLogger: ServiceLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {}
};

export const createLoggerOptions = (level: LogLevel, name?: string): LoggerOptions => ({
  level,
  name,
  base: undefined,
  timestamp: stdTimeFunctions.isoTime
});

/**
 * Adapts a pino instance to the `message, meta` call shape the services use.
 */
export function fromPino(logger: Logger): ServiceLogger {
  return {
    debug(message, meta) {
      logger.debug(meta ?? {}, message);
    },
    info(message, meta) {
      logger.info(meta ?? {}, message);
    },
    warn(message, meta) {
      logger.warn(meta ?? {}, message);
    },
    error(message, meta) {
      if (message instanceof Error) {
        logger.error({ ...meta, err: message }, message.message);
      } else {
        logger.error(meta ?? {}, message);
      }
    }
  } satisfies ServiceLogger;
}

export function createLogger(
  options: { level: LogLevel; name?: string },
  destination?: DestinationStream
): ServiceLogger {
  const loggerOptions = createLoggerOptions(options.level, options.name);
  return fromPino(destination ? pino(loggerOptions, destination) : pino(loggerOptions));
}
