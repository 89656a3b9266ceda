import { pino, destination, type Logger } from 'pino';

export type { Logger };

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

// stdout carries the HTML report, so logs go to stderr.
export function createLogger(level: LogLevel = 'info'): Logger {
  return pino({ name: 'pr-triage', level }, destination(2));
}
