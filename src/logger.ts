import { pino, type BaseLogger, type Logger, type LoggerOptions } from 'pino';

export type { BaseLogger, Logger };

// Payloads and credentials never reach the log stream
export const REDACT_PATHS = [
  'req.headers.authorization',
  'req.headers["x-internal-token"]',
  'payload',
  '*.payload',
  'data.payload',
  'result',
  '*.result',
  'token',
];

export interface LoggerSettings {
  level?: string;
  pretty?: boolean;
}

/** Options shared by standalone loggers and Fastify's built-in one. */
export function loggerOptions(settings: LoggerSettings = {}): LoggerOptions {
  const options: LoggerOptions = {
    level: settings.level ?? 'info',
    redact: { paths: REDACT_PATHS, censor: '[REDACTED]' },
  };
  if (settings.pretty) {
    options.transport = {
      target: 'pino-pretty',
      options: { translateTime: 'SYS:HH:MM:ss.l', ignore: 'pid,hostname' },
    };
  }
  return options;
}

export function createLogger(name: string, settings: LoggerSettings = {}): Logger {
  return pino({ name, ...loggerOptions(settings) });
}

/** Logger used by unit tests and library defaults. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
