import pino from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export function createLogger(name: string, level: LogLevel = 'info') {
  return pino({
    name,
    level,
    // session material attached by upload executors
    redact: { paths: ['cookies', '*.cookies', 'credentials'], censor: '[REDACTED]' },
    transport:
      process.env.NODE_ENV !== 'production'
        ? { target: 'pino-pretty', options: { colorize: true, translateTime: 'SYS:standard' } }
        : undefined,
  });
}

export type Logger = pino.Logger;
