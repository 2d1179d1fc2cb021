import { ALogger } from './ALogger.js';
import { isVerbose, isDebugLevel } from '../../config/env.js';
import type { LogContext } from './ALogger.js';
import type { LogLevel } from '../../config/env.js';

export type { LogContext } from './ALogger.js';
export type { LogLevel } from '../../config/env.js';

const STANDARD_KEYS = ['component', 'nodeId'];

/**
 * Format a single log line.
 *
 * `2024-01-15T10:30:00.000Z WARN  [component=animation, node=a1b2c3d4, name=walk] Unknown frame set`
 */
export function formatLogLine(
  level: LogLevel,
  message: string,
  context?: LogContext,
  timestamp: Date = new Date()
): string {
  const levelStr = level.toUpperCase().padEnd(5);

  let contextStr = '';
  if (context) {
    const parts: string[] = [];

    if (context.component) parts.push(`component=${context.component}`);
    if (context.nodeId) parts.push(`node=${String(context.nodeId).substring(0, 8)}`);

    Object.keys(context).forEach(key => {
      if (!STANDARD_KEYS.includes(key) && context[key] !== undefined) {
        parts.push(`${key}=${String(context[key])}`);
      }
    });

    if (parts.length > 0) {
      contextStr = ` [${parts.join(', ')}]`;
    }
  }

  return `${timestamp.toISOString()} ${levelStr}${contextStr} ${message}`;
}

class Logger extends ALogger {
  debug(message: string, context?: LogContext): void {
    if (isDebugLevel()) {
      console.log(formatLogLine('debug', message, context));
    }
  }

  info(message: string, context?: LogContext): void {
    console.log(formatLogLine('info', message, context));
  }

  warn(message: string, context?: LogContext): void {
    console.warn(formatLogLine('warn', message, context));
  }

  error(message: string, error?: Error | unknown, context?: LogContext): void {
    console.error(formatLogLine('error', message, context));
    if (error) {
      if (error instanceof Error) {
        console.error(`  Error: ${error.message}`);
        // In verbose mode or debug level, always show stack traces
        if (error.stack && (isVerbose() || isDebugLevel())) {
          console.error(`  Stack: ${error.stack}`);
        }
      } else {
        console.error(`  Details: ${JSON.stringify(error, null, 2)}`);
      }
    }
  }
}

export const logger: ALogger = new Logger();
