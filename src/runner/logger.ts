/**
 * Structured JSON-lines logger.
 *
 * Correlation is explicit: the correlation ID is fixed when the logger is
 * created, and `child()` binds per-subscription fields for one task without
 * touching any other task's lines.  All `data` payloads are redacted.
 */

import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { redactRecord } from './redact.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  module: string;
  action: string;
  message: string;
  correlation_id?: string;
  subscription_id?: string;
  tenant_id?: string;
  data?: Record<string, unknown>;
}

export interface LogBindings {
  subscriptionId?: string;
  tenantId?: string;
}

export interface StructuredLogger {
  debug(action: string, message: string, data?: Record<string, unknown>): void;
  info(action: string, message: string, data?: Record<string, unknown>): void;
  warn(action: string, message: string, data?: Record<string, unknown>): void;
  error(action: string, message: string, data?: Record<string, unknown>): void;
  fatal(action: string, message: string, data?: Record<string, unknown>): void;
  /** Logger sharing this one's sink and buffer, with extra bound fields. */
  child(bindings: LogBindings): StructuredLogger;
  /** All entries collected so far, children included. */
  entries(): readonly LogEntry[];
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal'];

export interface LoggerOptions {
  module: string;
  filePath?: string;
  minLevel?: LogLevel;
  /** Echo every line to stderr, not only error/fatal. */
  json?: boolean;
  /** Never echo to stderr (tests, library embedding). */
  silent?: boolean;
  correlationId?: string;
}

export function createLogger(opts: LoggerOptions): StructuredLogger {
  const buffer: LogEntry[] = [];
  const minPriority = LEVEL_PRIORITY[opts.minLevel ?? 'info'];

  function emit(
    bindings: LogBindings,
    level: LogLevel,
    action: string,
    message: string,
    data?: Record<string, unknown>,
  ): void {
    if (LEVEL_PRIORITY[level] < minPriority) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      module: opts.module,
      action,
      message,
      ...(opts.correlationId && { correlation_id: opts.correlationId }),
      ...(bindings.subscriptionId && { subscription_id: bindings.subscriptionId }),
      ...(bindings.tenantId && { tenant_id: bindings.tenantId }),
      ...(data && { data: redactRecord(data) }),
    };

    buffer.push(entry);

    const line = JSON.stringify(entry);

    if (opts.filePath) {
      mkdirSync(dirname(opts.filePath), { recursive: true });
      appendFileSync(opts.filePath, line + '\n', 'utf-8');
    }

    if (!opts.silent && (opts.json || level === 'error' || level === 'fatal')) {
      process.stderr.write(line + '\n');
    }
  }

  function bind(bindings: LogBindings): StructuredLogger {
    return {
      debug: (action, message, data) => emit(bindings, 'debug', action, message, data),
      info: (action, message, data) => emit(bindings, 'info', action, message, data),
      warn: (action, message, data) => emit(bindings, 'warn', action, message, data),
      error: (action, message, data) => emit(bindings, 'error', action, message, data),
      fatal: (action, message, data) => emit(bindings, 'fatal', action, message, data),
      child: (extra) => bind({ ...bindings, ...extra }),
      entries: (): readonly LogEntry[] => buffer,
    };
  }

  return bind({});
}
