import type { Logger } from '@libs/datastream-client';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface LogSink {
  log(...data: unknown[]): void;
  error(...data: unknown[]): void;
}

/**
 * Console-backed Logger. debug/info go to stdout, warn/error to stderr;
 * anything below `level` is dropped.
 */
export function createConsoleLogger(level: LogLevel = 'info', sink: LogSink = console): Logger {
  const emit =
    (entryLevel: Exclude<LogLevel, 'silent'>, toStderr: boolean) =>
    (msg: string, meta?: unknown): void => {
      if (LEVEL_ORDER[entryLevel] < LEVEL_ORDER[level]) {
        return;
      }
      const line = `[${entryLevel}] ${msg}`;
      const args = meta === undefined ? [line] : [line, meta];
      if (toStderr) {
        sink.error(...args);
      } else {
        sink.log(...args);
      }
    };

  return {
    debug: emit('debug', false),
    info: emit('info', false),
    warn: emit('warn', true),
    error: emit('error', true),
  };
}
