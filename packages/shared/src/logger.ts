/**
 * Prefixed stderr logging.
 *
 * stdout belongs to the stdio transport, so every line goes through
 * console.error as `[component] message`.
 */

import type { LogLevel } from './types.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
  child(component: string): Logger;
}

export function createLogger(component: string, level: LogLevel = 'info'): Logger {
  const threshold = LEVEL_ORDER[level];

  const write =
    (messageLevel: LogLevel) =>
    (message: string, ...details: unknown[]): void => {
      if (LEVEL_ORDER[messageLevel] < threshold) return;
      console.error(`[${component}] ${message}`, ...details);
    };

  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
    child: (name) => createLogger(name, level),
  };
}
