/**
 * Retry / back-off policy for collaborator calls.
 *
 * Every fetch from an external collaborator (cost query, advisor,
 * inventory) goes through `executeWithRetry` so transient failures are
 * handled uniformly.  State is per call: each invocation starts with a
 * fresh delay.
 */

import {
  AuthenticationExpiredError,
  RateLimitExceededError,
  ServiceHttpError,
  classifyFailure,
} from './errors.js';
import type { StructuredLogger } from './logger.js';

export interface RetryPolicy {
  maxRetries: number;
  initialDelayMs: number;
  backoffFactor: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  initialDelayMs: 1000,
  backoffFactor: 2,
  maxDelayMs: 60_000,
};

/** Wait used when Retry-After is an HTTP date rather than seconds. */
const RETRY_AFTER_DATE_FALLBACK_MS = 60_000;

export type Sleep = (ms: number) => Promise<void>;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RetryOptions {
  policy?: RetryPolicy;
  logger?: StructuredLogger;
  sleep?: Sleep;
  /** Operation name for log lines. */
  label?: string;
}

/**
 * Parse a Retry-After value into milliseconds.  Numbers are seconds; a
 * non-numeric string (an HTTP date) falls back to 60 s.
 */
export function parseRetryAfter(value: string | number | undefined): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0 ? value * 1000 : undefined;
  }
  const trimmed = value.trim();
  if (trimmed === '') return undefined;
  const seconds = Number(trimmed);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : RETRY_AFTER_DATE_FALLBACK_MS;
}

function headerValue(headers: unknown, name: string): string | undefined {
  if (typeof headers !== 'object' || headers === null) return undefined;

  if ('get' in headers && typeof headers.get === 'function') {
    const value: unknown = headers.get(name);
    return typeof value === 'string' ? value : undefined;
  }

  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted && typeof value === 'string') return value;
  }
  return undefined;
}

/**
 * Retry-After carried by the error: our own ServiceHttpError, or an SDK
 * error exposing `response.headers`.
 */
export function retryAfterOf(err: unknown): number | undefined {
  if (err instanceof ServiceHttpError) return parseRetryAfter(err.retryAfter);
  if (typeof err === 'object' && err !== null && 'response' in err) {
    const response = err.response;
    if (typeof response === 'object' && response !== null && 'headers' in response) {
      return parseRetryAfter(headerValue(response.headers, 'retry-after'));
    }
  }
  return undefined;
}

/**
 * Execute `operation` under `policy`.  Returns its value, or throws:
 * - AuthenticationExpiredError at once on an authentication failure
 * - RateLimitExceededError once rate-limit retries are exhausted
 * - the last underlying error once 5xx / network retries are exhausted
 * - the underlying error at once for other 4xx and unknown failures
 */
export async function executeWithRetry<T>(
  operation: () => T | Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const policy = options.policy ?? DEFAULT_RETRY_POLICY;
  const wait = options.sleep ?? sleep;
  const label = options.label ?? 'operation';
  const log = options.logger;
  let delay = policy.initialDelayMs;

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (err) {
      const failure = classifyFailure(err);
      const message = err instanceof Error ? err.message : String(err);
      const retriesLeft = attempt < policy.maxRetries;

      if (failure === 'authentication') {
        log?.error('retry.auth_failed', `${label}: authentication failed`, { error: message });
        throw new AuthenticationExpiredError(undefined, { cause: err });
      }

      if (failure === 'client' || failure === 'unknown') {
        log?.error('retry.not_retryable', `${label}: ${failure} error, not retrying`, { error: message });
        throw err;
      }

      if (!retriesLeft) {
        log?.error('retry.exhausted', `${label}: giving up after ${attempt + 1} attempt(s)`, {
          failure,
          error: message,
        });
        if (failure === 'rate_limit') throw new RateLimitExceededError(policy.maxRetries, { cause: err });
        throw err;
      }

      const retryAfter = failure === 'rate_limit' ? retryAfterOf(err) : undefined;
      // Retry-After: 0 falls back to the backoff delay.
      const waitMs = Math.min(retryAfter || delay, policy.maxDelayMs);
      log?.warn('retry.backoff', `${label}: ${failure} error, retrying in ${waitMs}ms (attempt ${attempt + 1}/${policy.maxRetries})`, {
        failure,
        wait_ms: waitMs,
        error: message,
      });
      await wait(waitMs);
      delay *= policy.backoffFactor;
    }
  }
}
