/**
 * Abstract Logger
 *
 * Base class for structured logging.
 *
 * @see Logger for the concrete implementation
 */
import type { LogContext } from './logger.doc.js';
import type { ILoggerDocumentation } from './logger.doc.js';

export type { LogContext } from './logger.doc.js';

export abstract class ALogger implements ILoggerDocumentation {
  abstract debug(message: string, context?: LogContext): void;

  abstract info(message: string, context?: LogContext): void;

  abstract warn(message: string, context?: LogContext): void;

  abstract error(message: string, error?: Error | unknown, context?: LogContext): void;
}
