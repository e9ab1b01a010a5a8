import pino, { stdTimeFunctions, type Logger, type LoggerOptions } from 'pino';

export type { Logger } from 'pino';

export type LoggerComponent = 'scheduler' | 'export' | 'raster' | 'storage' | 'imagery' | 'worker' | 'cli';

export const createLoggerOptions = (level: string): LoggerOptions => ({
  level,
  base: { service: 'nightlight-pipeline' },
  timestamp: stdTimeFunctions.isoTime,
  serializers: {
    err: pino.stdSerializers.err
  }
});

export function createLogger(level: string): Logger {
  return pino(createLoggerOptions(level));
}

export function componentLogger(root: Logger, component: LoggerComponent): Logger {
  return root.child({ component });
}

/** Logger that drops every line; used by tests and library callers without a logger. */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
