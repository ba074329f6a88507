import { pino, type Logger, type LoggerOptions } from 'pino';

export interface LoggerSettings {
  level?: string;
  pretty?: boolean;
}

export function createLogger(settings: LoggerSettings = {}): Logger {
  const level = settings.level || process.env.LOG_LEVEL || (process.env.NODE_ENV === 'test' ? 'silent' : 'info');
  const pretty = settings.pretty ?? (process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test');

  const options: LoggerOptions = { level, base: { service: 'brain-gateway' } };
  if (pretty) {
    options.transport = {
      target: 'pino-pretty',
      options: { colorize: true }
    };
  }

  return pino(options);
}

// Fallback for components constructed without an explicit logger
export const logger = createLogger();
