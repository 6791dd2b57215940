import pino from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Logger contract used by the pipeline. Satisfied by pino and by Fastify's
 * request logger.
 */
export interface QcLogger {
  debug(msg: string): void;
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
}

/**
 * pino logger writing to stdout, or to stderr when `stream` is 'stderr'
 * (the CLI keeps stdout for its own summary).
 */
export function createLogger(level: LogLevel = 'info', name = 'bead-qc', stream: 'stdout' | 'stderr' = 'stdout'): QcLogger {
  return pino({ name, level }, pino.destination(stream === 'stderr' ? 2 : 1));
}

export const silentLogger: QcLogger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
