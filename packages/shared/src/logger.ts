/**
 * Structured Logging
 *
 * One JSON object per line with the correlation id, job id and document
 * path of the current context. LOG_LEVEL picks the minimum level
 * (debug, info, warn, error or silent); without it debug lines appear
 * outside production only.
 */

import { getContext, getCorrelationId } from './context';

export interface LogContext {
  [key: string]: unknown;
}

type Level = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LEVEL_RANK: Record<string, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function minimumRank(): number {
  const configured = process.env.LOG_LEVEL?.toLowerCase();
  if (configured && configured in LEVEL_RANK) {
    return LEVEL_RANK[configured];
  }
  return process.env.NODE_ENV === 'production' ? LEVEL_RANK.info : LEVEL_RANK.debug;
}

function enabled(level: Level): boolean {
  return LEVEL_RANK[level.toLowerCase()] >= minimumRank();
}

function formatLog(level: Level, message: string, context?: LogContext): string {
  const reqContext = getContext();

  return JSON.stringify({
    timestamp: new Date().toISOString(),
    level,
    correlationId: getCorrelationId(),
    jobId: reqContext?.jobId,
    documentPath: reqContext?.documentPath,
    message,
    ...context,
  });
}

function describeError(error: unknown): LogContext['error'] {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return String(error);
}

export const logger = {
  debug: (message: string, context?: LogContext) => {
    if (enabled('DEBUG')) console.debug(formatLog('DEBUG', message, context));
  },

  info: (message: string, context?: LogContext) => {
    if (enabled('INFO')) console.log(formatLog('INFO', message, context));
  },

  warn: (message: string, context?: LogContext) => {
    if (enabled('WARN')) console.warn(formatLog('WARN', message, context));
  },

  error: (message: string, error?: unknown, context?: LogContext) => {
    if (enabled('ERROR')) {
      console.error(formatLog('ERROR', message, { ...context, error: describeError(error) }));
    }
  },
};
