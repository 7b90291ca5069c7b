/**
 * Request-scoped context threaded through every core operation.
 */

import { randomUUID } from 'crypto';
import { createLogger, type StructuredLogger, type LogLevel } from './logger.js';
import { DEFAULT_RETRY_POLICY, sleep, type RetryPolicy, type Sleep } from './retry.js';

export interface RunContext {
  readonly correlationId: string;
  readonly logger: StructuredLogger;
  readonly retryPolicy: RetryPolicy;
  readonly sleep: Sleep;
  /** Upper bound on subscriptions processed at once. */
  readonly concurrency: number;
}

export interface RunContextOptions {
  correlationId?: string;
  logger?: StructuredLogger;
  logLevel?: LogLevel;
  logFilePath?: string;
  json?: boolean;
  silent?: boolean;
  retryPolicy?: RetryPolicy;
  sleep?: Sleep;
  concurrency?: number;
}

export const DEFAULT_CONCURRENCY = 4;

export function createRunContext(opts: RunContextOptions = {}): RunContext {
  const correlationId = opts.correlationId ?? randomUUID();
  const logger = opts.logger ?? createLogger({
    module: 'finops-signals',
    correlationId,
    minLevel: opts.logLevel,
    filePath: opts.logFilePath,
    json: opts.json,
    silent: opts.silent,
  });

  return {
    correlationId,
    logger,
    retryPolicy: opts.retryPolicy ?? DEFAULT_RETRY_POLICY,
    sleep: opts.sleep ?? sleep,
    concurrency: Math.max(1, opts.concurrency ?? DEFAULT_CONCURRENCY),
  };
}
