import pino, { type Logger } from 'pino';
import type { LogLevel } from '../types/index.js';

export type { Logger } from 'pino';

/**
 * Create the root logger. Components receive children of it. CLI commands
 * that print results to stdout log to stderr instead.
 */
export function createLogger(level: LogLevel = 'info', target: 'stdout' | 'stderr' = 'stdout'): Logger {
  return pino(
    {
      name: 'trafficsmith',
      level,
    },
    pino.destination(target === 'stderr' ? 2 : 1)
  );
}

/**
 * Logger used when a component is constructed without one
 */
export const silentLogger: Logger = pino({ level: 'silent' });
