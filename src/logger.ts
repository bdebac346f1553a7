import type { LogLevel } from './config.js';

export interface Logger {
  debug(message: string, ...meta: unknown[]): void;
  info(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  error(message: string, ...meta: unknown[]): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Console logger that drops messages below `level`
 */
export function createLogger(level: LogLevel = 'info', sink: Logger = console): Logger {
  const enabled = (messageLevel: LogLevel) => LEVEL_RANK[messageLevel] >= LEVEL_RANK[level];

  return {
    debug: (message, ...meta) => { if (enabled('debug')) sink.debug(message, ...meta); },
    info: (message, ...meta) => { if (enabled('info')) sink.info(message, ...meta); },
    warn: (message, ...meta) => { if (enabled('warn')) sink.warn(message, ...meta); },
    error: (message, ...meta) => { if (enabled('error')) sink.error(message, ...meta); },
  };
}
