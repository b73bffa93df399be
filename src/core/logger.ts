/**
 * doxygen-md - Logger
 *
 * Console logging with configurable verbosity. Lines go to stderr by default
 * so that Markdown printed on stdout stays clean.
 */

import type { Logger } from '../types';

/**
 * Receives one formatted log line plus any extra arguments
 */
export type LogSink = (line: string, ...args: unknown[]) => void;

const PREFIX = '[doxygen-md]';

const LEVEL_MARKERS = {
  debug: '',
  info: '',
  warn: '⚠️  ',
  error: '❌ ',
} as const;

type Level = keyof typeof LEVEL_MARKERS;

function format(level: Level, message: string): string {
  return `${PREFIX} ${LEVEL_MARKERS[level]}${message}`;
}

/**
 * Create a logger instance; debug lines are dropped unless `verbose` is set
 */
export function createLogger(verbose: boolean, sink: LogSink = console.error): Logger {
  const log = (level: Level) => (message: string, ...args: unknown[]) => {
    if (level === 'debug' && !verbose) {
      return;
    }
    sink(format(level, message), ...args);
  };

  return {
    debug: log('debug'),
    info: log('info'),
    warn: log('warn'),
    error: log('error'),
  };
}

/**
 * No-op logger for silent operation
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
