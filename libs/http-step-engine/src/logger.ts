import pino, { stdTimeFunctions } from 'pino';
import type { Logger as PinoLogger, LoggerOptions } from 'pino';
import type { Logger, LoggerMeta } from './types';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface CreateLoggerOptions {
  level?: LogLevel;
  name?: string;
  /** Existing pino instance to adapt instead of creating one. */
  instance?: PinoLogger;
}

export const createLoggerOptions = (level: LogLevel, name?: string): LoggerOptions => ({
  level,
  name,
  base: undefined,
  timestamp: stdTimeFunctions.isoTime,
});

/** Adapts a pino logger to the engine's `Logger` interface. */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const instance = options.instance ?? pino(createLoggerOptions(options.level ?? 'info', options.name ?? 'stepwise'));

  return {
    debug: (message: string, meta?: LoggerMeta) => instance.debug(meta ?? {}, message),
    info: (message: string, meta?: LoggerMeta) => instance.info(meta ?? {}, message),
    warn: (message: string, meta?: LoggerMeta) => instance.warn(meta ?? {}, message),
    error: (message: string, meta?: LoggerMeta) => instance.error(meta ?? {}, message),
  };
}

export const noopLogger: Logger = {
  debug: () => {
    /* no-op */
  },
  info: () => {
    /* no-op */
  },
  warn: () => {
    /* no-op */
  },
  error: () => {
    /* no-op */
  },
};
