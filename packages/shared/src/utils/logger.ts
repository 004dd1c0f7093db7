import pino from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export type Logger = pino.Logger;

export interface CreateLoggerOptions {
  name?: string;
  level?: LogLevel;
  pretty?: boolean;
  destination?: string;
}

export function createLogger(options: CreateLoggerOptions = {}): pino.Logger {
  const { name = 'hostpulse', level = 'info', pretty = false, destination } = options;

  const transport = pretty
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:HH:MM:ss.l',
          ignore: 'pid',
        },
      }
    : undefined;

  const dest = destination ? pino.destination(destination) : undefined;

  return pino(
    {
      name,
      level,
      transport: dest ? undefined : transport,
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level(label) {
          return { level: label };
        },
      },
    },
    dest,
  );
}

function defaultLevel(): LogLevel {
  const fromEnv = process.env.HOSTPULSE_LOG_LEVEL;
  if (
    fromEnv === 'trace' ||
    fromEnv === 'debug' ||
    fromEnv === 'info' ||
    fromEnv === 'warn' ||
    fromEnv === 'error' ||
    fromEnv === 'fatal' ||
    fromEnv === 'silent'
  ) {
    return fromEnv;
  }
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

let defaultLogger: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (!defaultLogger) {
    defaultLogger = createLogger({
      level: defaultLevel(),
      pretty: process.env.NODE_ENV === 'development',
    });
  }
  return defaultLogger;
}

export function setDefaultLogger(logger: pino.Logger): void {
  defaultLogger = logger;
}
