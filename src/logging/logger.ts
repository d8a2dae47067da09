import pino, { type Logger, type LoggerOptions } from 'pino';

export type { Logger };

export interface LoggerSettings {
  level?: string;
  pretty?: boolean;
}

export function createLogger(settings: LoggerSettings = {}): Logger {
  const options: LoggerOptions = {
    level: settings.level ?? process.env.LOG_LEVEL ?? 'info',
    base: { service: 'chaffgate' }
  };

  const pretty = settings.pretty ?? process.env.LOG_PRETTY !== 'false';
  if (pretty) {
    options.transport = {
      target: 'pino-pretty',
      options: { colorize: true, translateTime: 'SYS:standard', ignore: 'pid,hostname,service' }
    };
  }

  return pino(options);
}

// Quiet logger for tests and embedding
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
