/**
 * Logging utilities for the scene package
 * @module utils/logging
 */

export { ALogger, type LogContext } from './ALogger.js';
export { logger, formatLogLine, type LogLevel } from './logger.js';
