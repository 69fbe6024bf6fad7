/**
 * Console Logger Adapter
 *
 * pino-backed logger writing to stderr, so log lines never interleave with
 * the ATM menu on stdout. LOG_PRETTY switches to pino-pretty.
 */

import pino from 'pino';
import { env } from '@/config/env';
import { ILogger, LogMetadata } from '@/interfaces/ILogger';

const STDERR_FD = 2;

export class ConsoleLogger implements ILogger {
  private logger: pino.Logger;

  constructor(context?: string) {
    const options: pino.LoggerOptions = {
      name: context || 'atm',
      level: env.LOG_LEVEL,
      formatters: {
        level: (label) => {
          return { level: label };
        },
      },
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: { error: pino.stdSerializers.err, reason: pino.stdSerializers.err },
    };

    this.logger = env.LOG_PRETTY
      ? pino({
          ...options,
          transport: {
            target: 'pino-pretty',
            options: {
              destination: STDERR_FD,
              colorize: true,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname',
            },
          },
        })
      : pino(options, pino.destination({ dest: STDERR_FD, sync: true }));
  }

  debug(messageOrMetadata: string | LogMetadata, message?: string): void {
    if (typeof messageOrMetadata === 'string') {
      this.logger.debug(messageOrMetadata);
    } else {
      this.logger.debug(messageOrMetadata, message);
    }
  }

  info(messageOrMetadata: string | LogMetadata, message?: string): void {
    if (typeof messageOrMetadata === 'string') {
      this.logger.info(messageOrMetadata);
    } else {
      this.logger.info(messageOrMetadata, message);
    }
  }

  warn(messageOrMetadata: string | LogMetadata, message?: string): void {
    if (typeof messageOrMetadata === 'string') {
      this.logger.warn(messageOrMetadata);
    } else {
      this.logger.warn(messageOrMetadata, message);
    }
  }

  error(messageOrMetadata: string | LogMetadata, message?: string): void {
    if (typeof messageOrMetadata === 'string') {
      this.logger.error(messageOrMetadata);
    } else {
      this.logger.error(messageOrMetadata, message);
    }
  }

  fatal(messageOrMetadata: string | LogMetadata, message?: string): void {
    if (typeof messageOrMetadata === 'string') {
      this.logger.fatal(messageOrMetadata);
    } else {
      this.logger.fatal(messageOrMetadata, message);
    }
  }
}
