/**
 * Structured logging for framegrab
 *
 * Logs go to stderr so stdout only carries the command's result.
 */

import pino, { type Logger as PinoLogger, type LoggerOptions } from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

// Re-export pino's Logger type for convenience
export type Logger = PinoLogger;

export interface LogContext {
  component?: string;
  stage?: string;
  [key: string]: unknown;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && (LOG_LEVELS as readonly string[]).includes(value);
}

// Create base logger
function createBaseLogger(level: LogLevel = 'info') {
  const options: LoggerOptions = {
    level,
    base: {
      service: 'framegrab',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  if (process.env.NODE_ENV === 'development') {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname,service',
          destination: 2,
        },
      },
    });
  }

  return pino(options, pino.destination(2));
}

// Singleton logger instance
let loggerInstance: Logger | null = null;

export function getLogger(): Logger {
  if (!loggerInstance) {
    const fromEnv = process.env.LOG_LEVEL;
    loggerInstance = createBaseLogger(isLogLevel(fromEnv) ? fromEnv : 'info');
  }
  return loggerInstance;
}

// Create child logger with context
export function createChildLogger(context: LogContext): Logger {
  return getLogger().child(context);
}

// Convenience function to create a named logger
export function createLogger(name: string): Logger {
  return createChildLogger({ component: name });
}

// Reset logger (for testing)
export function resetLogger(): void {
  loggerInstance = null;
}
