/**
 * Console Logger Adapter
 *
 * Logger implementation using pino for structured logging to stdout.
 *
 * Features:
 * - Structured JSON logging (parseable by log aggregators)
 * - Pretty printing in development (human-readable)
 */

import pino from 'pino';
import { ILogger, LogMetadata } from '@/interfaces/ILogger';
import { env } from '@/config/env';

type Level = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export class ConsoleLogger implements ILogger {
  private logger: pino.Logger;

  constructor(context?: string) {
    this.logger = pino({
      name: context || 'ledger',
      level: env.LOG_LEVEL,
      // Pretty print in development for readability
      transport:
        env.NODE_ENV === 'development' && env.LOG_PRETTY
          ? {
              target: 'pino-pretty',
              options: {
                colorize: true,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname',
              },
            }
          : undefined,
      formatters: {
        level: (label) => {
          return { level: label };
        },
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    });
  }

  debug(messageOrMetadata: string | LogMetadata, message?: string): void {
    this.write('debug', messageOrMetadata, message);
  }

  info(messageOrMetadata: string | LogMetadata, message?: string): void {
    this.write('info', messageOrMetadata, message);
  }

  warn(messageOrMetadata: string | LogMetadata, message?: string): void {
    this.write('warn', messageOrMetadata, message);
  }

  error(messageOrMetadata: string | LogMetadata, message?: string): void {
    this.write('error', messageOrMetadata, message);
  }

  fatal(messageOrMetadata: string | LogMetadata, message?: string): void {
    this.write('fatal', messageOrMetadata, message);
  }

  private write(level: Level, messageOrMetadata: string | LogMetadata, message?: string): void {
    if (typeof messageOrMetadata === 'string') {
      this.logger[level](messageOrMetadata);
    } else {
      this.logger[level](messageOrMetadata, message);
    }
  }
}
