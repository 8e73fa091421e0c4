// apps/cli/src/logger.ts
//
// pino logger for the CLI. Everything goes to stderr: stdout carries the game.

import pino, { type Logger } from 'pino';
import type { LogLevel } from '@number-guess/protocol';

/**
 * Synchronous stderr destination. A write that fails with EAGAIN is not
 * retried: a reader that stopped draining the pipe must not stall the process.
 */
export const STDERR_DESTINATION = {
  dest: 2,
  sync: true,
  retryEAGAIN: (): boolean => false,
};

export function createLogger(
  level: LogLevel,
  destination: pino.DestinationStream = pino.destination(STDERR_DESTINATION),
): Logger {
  return pino({ name: 'number-guess', level }, destination);
}
