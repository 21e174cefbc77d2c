import pino from 'pino';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function resolveLevel(): LogLevel {
  const level = process.env.LOG_LEVEL;
  return level && isLogLevel(level) ? level : 'info';
}

function buildBaseLogger(): pino.Logger {
  const loggerOptions: pino.LoggerOptions =
    process.env.NODE_ENV === 'development'
      ? {
          name: 'capability-router',
          level: resolveLevel(),
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
            },
          },
        }
      : {
          name: 'capability-router',
          level: resolveLevel(),
        };

  return pino(loggerOptions);
}

const baseLogger = buildBaseLogger();

/** Short id used to tie together the log lines of one routed message. */
export function generateCorrelationId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
}

export function createLogger(context?: Record<string, unknown>): pino.Logger {
  return context ? baseLogger.child(context) : baseLogger;
}

/** Loggers created after this call use the new level; existing children keep theirs. */
export function setLogLevel(level: LogLevel): void {
  baseLogger.level = level;
}
