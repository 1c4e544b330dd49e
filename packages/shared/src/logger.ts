/**
 * Structured Logging with Correlation IDs
 *
 * All logs automatically include the correlation ID and source file from the
 * AsyncLocalStorage context. LOG_LEVEL sets the threshold (debug, info, warn, error).
 */

import { getCorrelationId, getContext } from './context';

export interface LogContext {
  [key: string]: unknown;
}

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function thresholdFromEnv(): number {
  const raw = (process.env.LOG_LEVEL || '').toLowerCase();
  if (raw === 'debug' || raw === 'info' || raw === 'warn' || raw === 'error') {
    return LEVEL_ORDER[raw];
  }
  // Debug output stays on outside production unless a level is set
  return process.env.NODE_ENV === 'production' ? LEVEL_ORDER.info : LEVEL_ORDER.debug;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= thresholdFromEnv();
}

function formatLog(level: string, message: string, context?: LogContext): string {
  const reqContext = getContext();

  const logEntry = {
    timestamp: new Date().toISOString(),
    level,
    correlationId: getCorrelationId(),
    sourceFile: reqContext?.sourceFile,
    message,
    ...context,
  };

  return JSON.stringify(logEntry);
}

export const logger = {
  info: (message: string, context?: LogContext) => {
    if (enabled('info')) console.log(formatLog('INFO', message, context));
  },

  warn: (message: string, context?: LogContext) => {
    if (enabled('warn')) console.warn(formatLog('WARN', message, context));
  },

  error: (message: string, error?: Error | unknown, context?: LogContext) => {
    if (!enabled('error')) return;
    const errorContext = {
      ...context,
      error:
        error instanceof Error
          ? {
              message: error.message,
              stack: error.stack,
              name: error.name,
            }
          : String(error),
    };
    console.error(formatLog('ERROR', message, errorContext));
  },

  debug: (message: string, context?: LogContext) => {
    if (enabled('debug')) console.debug(formatLog('DEBUG', message, context));
  },
};
