/**
 * Logger Documentation Interface
 *
 * This file contains the fully-documented interface for the Logger.
 * Implementation classes should implement this interface to inherit documentation.
 *
 * @see ALogger for the abstract base class
 * @see Logger for the concrete implementation
 */

/**
 * Context metadata attached to log entries.
 */
export interface LogContext {
  /** Component name (e.g., 'scene', 'animation', 'render') */
  component?: string;
  /** Scene node identifier (displayed truncated to 8 chars) */
  nodeId?: string;
  /** Additional context fields */
  [key: string]: unknown;
}

/**
 * Interface for Logger with full documentation.
 *
 * ## Log Format
 *
 * ```
 * 2024-01-15T10:30:00.000Z INFO  [component=scene, node=a1b2c3d4] Child added
 * ```
 *
 * ## Levels
 *
 * - `debug` - printed only when `LOG_LEVEL=debug` or `VERBOSE_MODE=debug`
 * - `info` - printed to `console.log`
 * - `warn` - printed to `console.warn`
 * - `error` - printed to `console.error`, followed by the error details
 *
 * @example
 * ```typescript
 * import { logger } from './logger.js';
 *
 * logger.debug('Frame set registered', { component: 'animation', name: 'walk' });
 * logger.warn('Unknown frame set', { component: 'animation', nodeId: node.id });
 * ```
 */
export interface ILoggerDocumentation {
  /**
   * Log a debug message.
   *
   * @param message - The log message
   * @param context - Optional context metadata
   */
  debug(message: string, context?: LogContext): void;

  /**
   * Log an info message.
   *
   * @param message - The log message
   * @param context - Optional context metadata
   */
  info(message: string, context?: LogContext): void;

  /**
   * Log a warning message.
   *
   * @param message - The log message
   * @param context - Optional context metadata
   */
  warn(message: string, context?: LogContext): void;

  /**
   * Log an error message.
   *
   * If an Error is provided its message is printed on the following line,
   * and its stack trace as well in verbose mode.
   *
   * @param message - The log message
   * @param error - Optional error object
   * @param context - Optional context metadata
   */
  error(message: string, error?: Error | unknown, context?: LogContext): void;
}
