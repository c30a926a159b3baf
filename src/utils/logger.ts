import pino from 'pino';

export type Logger = pino.Logger;

export interface LoggerOptions {
  level?: string;
  name?: string;
}

/**
 * Build the process logger. Created once in the entry point and handed to
 * every component that logs.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? 'notes-store',
    level: options.level ?? 'info',
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

/**
 * Logger that drops everything. Handy for tests and scripts.
 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
