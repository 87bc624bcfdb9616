import pino from 'pino';
import type { PersistFailure, RejectedInput } from '@study-cadence/core';

const logLevel = process.env.LOG_LEVEL ?? 'info';

export const logger = pino({
  level: logLevel,
  transport:
    process.env.NODE_ENV === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
  base: {
    service: 'study-cadence-api',
  },
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export type Logger = typeof logger;

export interface ErrorContext {
  requestId?: string;
  method?: string;
  url?: string;
  itemId?: string;
  [key: string]: unknown;
}

export interface PerformanceMetrics {
  operation: string;
  durationMs: number;
  success: boolean;
  metadata?: Record<string, unknown>;
}

/**
 * Wrap a thrown value that is not an `Error`, so it can go through `logError`.
 */
export function toError(reason: unknown): Error {
  return reason instanceof Error ? reason : new Error(String(reason));
}

export function logError(error: Error, context?: ErrorContext, customLogger?: Logger): void {
  const log = customLogger ?? logger;
  log.error(
    {
      error: {
        name: error.name,
        message: error.message,
        stack: error.stack,
      },
      ...context,
    },
    `Error: ${error.message}`
  );
}

export function logPerformance(metrics: PerformanceMetrics, customLogger?: Logger): void {
  const log = customLogger ?? logger;
  const level = metrics.success ? 'info' : 'warn';

  log[level](
    {
      performance: {
        operation: metrics.operation,
        durationMs: metrics.durationMs,
        success: metrics.success,
        ...metrics.metadata,
      },
    },
    `${metrics.operation} completed in ${metrics.durationMs}ms`
  );
}

/**
 * One warning per rejected item or event, so each can be traced by id.
 */
export function logRejections(
  operation: string,
  rejected: readonly RejectedInput[],
  customLogger?: Logger
): void {
  const log = customLogger ?? logger;
  for (const entry of rejected) {
    log.warn({ operation, rejected: entry }, `${operation}: rejected ${entry.id} (${entry.code})`);
  }
}

export function logPersistFailures(
  operation: string,
  failures: readonly PersistFailure[],
  customLogger?: Logger
): void {
  const log = customLogger ?? logger;
  for (const failure of failures) {
    log.error({ operation, failure }, `${operation}: ${failure.stage} failed for ${failure.id}`);
  }
}

export function createChildLogger(bindings: Record<string, unknown>): Logger {
  return logger.child(bindings);
}
