/**
 * Logger Factory
 *
 * Creates named logger instances. Every service logs through a logger built
 * here so the level and format are configured in one place (see env.ts).
 */

import { ILogger, ILoggerFactory } from '@/interfaces/ILogger';
import { ConsoleLogger } from './ConsoleLogger';

export class LoggerFactory implements ILoggerFactory {
  createLogger(context?: string): ILogger {
    return new ConsoleLogger(context);
  }
}

/**
 * Default logger instance for application use
 */
const factory = new LoggerFactory();
export const logger = factory.createLogger('ledger');

/**
 * Create named loggers for specific contexts
 */
export function createLogger(context: string): ILogger {
  return factory.createLogger(context);
}
