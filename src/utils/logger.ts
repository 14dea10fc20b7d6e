import pino from 'pino';

export function generateCorrelationId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
}

const level = process.env.LOG_LEVEL || 'info';

const rootLogger = pino(
  process.env.NODE_ENV === 'development'
    ? {
        level,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
          },
        },
      }
    : { level }
);

/** Applies the validated level; loggers created afterwards inherit it. */
export function setLogLevel(level: pino.Level): void {
  rootLogger.level = level;
}

export function createLogger(context?: Record<string, unknown>): pino.Logger {
  return context ? rootLogger.child(context) : rootLogger;
}

export const logger = createLogger();
