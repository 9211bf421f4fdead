/**
 * Structured logger for the shardkit CLI, powered by pino.
 *
 * On a TTY output is pretty-printed through pino-pretty; otherwise one JSON
 * object per line is written to stdout.
 */
import pino from 'pino';
import type { DestinationStream, Logger } from 'pino';
import type { LogLevel } from './config.js';

export type { Logger };

export interface LoggerOptions {
  readonly level: LogLevel;
  /** Write JSON lines here instead of stdout. */
  readonly destination?: DestinationStream;
}

export function createLogger(options: LoggerOptions): Logger {
  const settings = { name: 'shardkit', level: options.level };
  if (options.destination) {
    return pino(settings, options.destination);
  }

  const transport = process.stdout.isTTY
    ? pino.transport({ target: 'pino-pretty', options: { colorize: true } })
    : undefined;
  return pino(settings, transport);
}
