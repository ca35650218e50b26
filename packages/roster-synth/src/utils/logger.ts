/**
 * Logger utility
 */

import { pino, type Logger } from 'pino';
import type { LogLevel } from '../types.js';

export type { Logger };

export interface LoggerOptions {
  level?: LogLevel;
  pretty?: boolean;
  name?: string;
}

/**
 * Create a logger instance
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? 'roster-synth',
    level: options.level ?? 'info',
    transport: options.pretty
      ? { target: 'pino-pretty', options: { colorize: true } }
      : undefined
  });
}

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
