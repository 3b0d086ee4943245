import pino from 'pino';
import type { LogFormat, LogLevel } from '../types.js';

export interface LoggerOptions {
  name?: string;
  level?: LogLevel | 'silent';
  format?: LogFormat;
  /**
   * Where log lines go instead of stdout. The text format runs pino-pretty in
   * a worker thread, so it only takes a file descriptor.
   */
  destination?: pino.DestinationStream | number;
}

/**
 * Logger wrapper for the front-end settings layer
 */
export class Logger {
  private pino: pino.Logger;

  constructor(options: LoggerOptions = {}) {
    const base: pino.LoggerOptions = {
      name: options.name ?? 'chanfront',
      level: options.level ?? 'info',
    };

    const { destination } = options;
    if (options.format === 'text') {
      if (destination !== undefined && typeof destination !== 'number') {
        throw new Error('The text log format writes to a file descriptor, not a stream');
      }
      this.pino = pino({
        ...base,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
            ...(destination === undefined ? {} : { destination }),
          },
        },
      });
    } else if (typeof destination === 'number') {
      this.pino = pino(base, pino.destination(destination));
    } else if (destination) {
      this.pino = pino(base, destination);
    } else {
      this.pino = pino(base);
    }
  }

  get level(): string {
    return this.pino.level;
  }

  debug(message: string, data?: unknown): void {
    if (data) {
      this.pino.debug(data, message);
    } else {
      this.pino.debug(message);
    }
  }

  info(message: string, data?: unknown): void {
    if (data) {
      this.pino.info(data, message);
    } else {
      this.pino.info(message);
    }
  }

  warn(message: string, data?: unknown): void {
    if (data) {
      this.pino.warn(data, message);
    } else {
      this.pino.warn(message);
    }
  }

  error(message: string, error?: unknown): void {
    if (error instanceof Error) {
      this.pino.error({ err: error }, message);
    } else if (error) {
      this.pino.error(error, message);
    } else {
      this.pino.error(message);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    const child = new Logger({ level: 'silent' });
    child.pino = this.pino.child(bindings);
    return child;
  }
}

/** Silent logger for callers that do not pass one */
export const nullLogger = new Logger({ level: 'silent' });

/** Logger configured from the `logging` section of loaded settings */
export function loggerFor(
  logging: { level: LogLevel; format: LogFormat },
  name = 'chanfront',
  destination?: LoggerOptions['destination']
): Logger {
  return new Logger({ name, level: logging.level, format: logging.format, destination });
}
