/**
 * Tagged console logger
 *
 * Prints `[tag] message`, with the same emoji markers the CLI output uses.
 * Warnings and errors go to stderr so stdout stays clean for results.
 */

import { config, logLevelRank, type LogLevel } from '../config/env.js';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const MARKERS: Record<Exclude<LogLevel, 'silent'>, string> = {
  debug: '',
  info: '',
  warn: '⚠️  ',
  error: '❌ ',
};

export function createLogger(tag: string, level: LogLevel = config.logLevel): Logger {
  const threshold = logLevelRank(level);

  const emit = (at: Exclude<LogLevel, 'silent'>, message: string) => {
    if (logLevelRank(at) < threshold) return;
    const line = `[${tag}] ${MARKERS[at]}${message}`;
    if (at === 'warn' || at === 'error') {
      console.error(line);
    } else {
      console.log(line);
    }
  };

  return {
    debug: message => emit('debug', message),
    info: message => emit('info', message),
    warn: message => emit('warn', message),
    error: message => emit('error', message),
  };
}

/** Discards everything, for tests and library callers that log themselves */
export const silentLogger: Logger = createLogger('silent', 'silent');
