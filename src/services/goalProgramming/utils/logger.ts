/**
 * Tagged console logging
 *
 * Lines are prefixed with a bracketed component tag ([Model], [HiGHS],
 * [GLPK], [Solver]). info and debug are gated by the configured level;
 * warnings and errors always go out.
 */

import type { LogLevel } from '../types';

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  silent: 0,
  info: 1,
  debug: 2,
};

export function createLogger(tag: string, level: LogLevel): Logger {
  const prefix = `[${tag}]`;
  const rank = LEVEL_RANK[level];

  return {
    debug(message, ...details) {
      if (rank >= LEVEL_RANK.debug) console.log(`${prefix} ${message}`, ...details);
    },
    info(message, ...details) {
      if (rank >= LEVEL_RANK.info) console.log(`${prefix} ${message}`, ...details);
    },
    warn(message, ...details) {
      console.warn(`${prefix} ${message}`, ...details);
    },
    error(message, ...details) {
      console.error(`${prefix} ${message}`, ...details);
    },
  };
}
