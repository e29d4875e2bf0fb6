import pino, { type Logger, type LoggerOptions } from 'pino';

export type AppLogger = Logger;

export interface LoggerConfig {
  environment: string;
  level?: string;
}

export function createLogger(config: LoggerConfig): AppLogger {
  const isProduction = config.environment === 'production';

  const baseOptions: LoggerOptions = {
    level: config.level ?? (isProduction ? 'info' : 'debug'),
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (isProduction || config.environment === 'test') {
    // JSON output for log aggregation
    return pino({
      ...baseOptions,
      base: {
        service: 'reflex-api',
        env: config.environment,
      },
    });
  }

  return pino({
    ...baseOptions,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss',
        ignore: 'pid,hostname',
      },
    },
  });
}

let logger: AppLogger | null = null;

export function getLogger(): AppLogger {
  if (!logger) {
    logger = pino({ level: 'info' });
  }
  return logger;
}

export function initLogger(config: LoggerConfig): AppLogger {
  logger = createLogger(config);
  return logger;
}

export function logError(log: AppLogger, error: Error, context?: Record<string, unknown>) {
  log.error(
    {
      event: 'error',
      error: {
        name: error.name,
        message: error.message,
        stack: error.stack,
      },
      ...context,
    },
    error.message,
  );
}
