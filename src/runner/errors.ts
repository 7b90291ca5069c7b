/**
 * Error taxonomy and the shared failure envelope.
 *
 * Collaborators report failures with the Service* classes (or SDK errors of
 * the same shape); the retry executor raises AuthenticationExpiredError and
 * RateLimitExceededError.  Everything that leaves the core goes through
 * `toFailureEnvelope` so CLI output, logs and library callers see one shape.
 */

import { ZodError } from 'zod';
import { redactString } from './redact.js';

// ---- Exit codes -------------------------------------------------------
export const EXIT_SUCCESS = 0;
export const EXIT_VALIDATION = 2;
export const EXIT_DEPENDENCY = 3;
export const EXIT_BUG = 4;

// ---- Errors raised by collaborators ------------------------------------

export class ServiceAuthenticationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ServiceAuthenticationError';
  }
}

export class ServiceHttpError extends Error {
  readonly statusCode: number;
  /** Raw Retry-After value: seconds or an HTTP date. */
  readonly retryAfter?: string | number;

  constructor(statusCode: number, message: string, options: { retryAfter?: string | number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'ServiceHttpError';
    this.statusCode = statusCode;
    this.retryAfter = options.retryAfter;
  }
}

export class ServiceNetworkError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ServiceNetworkError';
  }
}

// ---- Errors raised by the core ---------------------------------------

export class AuthenticationExpiredError extends Error {
  constructor(message = 'Azure authentication token expired. Please refresh credentials.', options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AuthenticationExpiredError';
  }
}

export class RateLimitExceededError extends Error {
  readonly retries: number;

  constructor(retries: number, options?: { cause?: unknown }) {
    super(
      `Azure API rate limit exceeded after ${retries} retries. Please reduce request frequency.`,
      options,
    );
    this.name = 'RateLimitExceededError';
    this.retries = retries;
  }
}

export class ValidationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/** One `path: message` line per zod issue. */
export function formatZodIssues(err: ZodError): string[] {
  return err.issues.map((i) => `${i.path.length > 0 ? i.path.join('.') : '(root)'}: ${i.message}`);
}

/** Raise a ValidationError carrying the zod issues, one per path. */
export function fromZodError(context: string, err: ZodError): ValidationError {
  const issues = formatZodIssues(err);
  return new ValidationError(`${context}: ${issues.join('; ')}`, issues);
}

// ---- Failure envelope --------------------------------------------------

export type ErrorKind =
  | 'AUTHENTICATION_EXPIRED'
  | 'RATE_LIMIT_EXCEEDED'
  | 'TRANSIENT_SERVICE_ERROR'
  | 'CLIENT_ERROR'
  | 'NOT_FOUND'
  | 'VALIDATION_ERROR'
  | 'UNKNOWN_ERROR';

export interface FailureEnvelope {
  error_kind: ErrorKind;
  message: string;
  details: string;
  remediation: string[];
  retryable: boolean;
}

const KIND_TO_EXIT: Record<ErrorKind, number> = {
  AUTHENTICATION_EXPIRED: EXIT_DEPENDENCY,
  RATE_LIMIT_EXCEEDED: EXIT_DEPENDENCY,
  TRANSIENT_SERVICE_ERROR: EXIT_DEPENDENCY,
  CLIENT_ERROR: EXIT_DEPENDENCY,
  NOT_FOUND: EXIT_VALIDATION,
  VALIDATION_ERROR: EXIT_VALIDATION,
  UNKNOWN_ERROR: EXIT_BUG,
};

const RETRYABLE = new Set<ErrorKind>(['RATE_LIMIT_EXCEEDED', 'TRANSIENT_SERVICE_ERROR']);

export const REMEDIATION: Readonly<Record<ErrorKind, readonly string[]>> = {
  AUTHENTICATION_EXPIRED: [
    'Verify AZURE_TENANT_ID, AZURE_CLIENT_ID are correct',
    'Ensure certificate is valid and not expired',
    'Check Service Principal has required RBAC roles: Cost Management Reader, Reader, Advisor Reader',
  ],
  RATE_LIMIT_EXCEEDED: [
    'Reduce the number of concurrent requests',
    'Implement caching for frequently accessed data',
    'Consider batching requests',
    'Wait before retrying (recommended: 60 seconds)',
  ],
  TRANSIENT_SERVICE_ERROR: [
    'Check Azure service health status',
    'Verify network connectivity to Azure',
    'Retry the operation later',
  ],
  CLIENT_ERROR: [
    'Verify API permissions and RBAC roles',
    'Check the request parameters and subscription configuration',
    'Review Azure SDK documentation for this error code',
  ],
  NOT_FOUND: [
    'Verify subscription ID is correct',
    'Check resource group and resource names',
    'Ensure Service Principal has access to the subscription',
  ],
  VALIDATION_ERROR: [
    'Check the input file against the documented record shape',
    'Set AZURE_SUBSCRIPTION_IDS or pass --subscriptions',
  ],
  UNKNOWN_ERROR: [
    'Check application logs for details',
    'Verify network connectivity to Azure',
    'Contact support if the issue persists',
  ],
};

const MESSAGES: Record<ErrorKind, string> = {
  AUTHENTICATION_EXPIRED: 'Azure authentication failed. Please check your credentials and RBAC permissions.',
  RATE_LIMIT_EXCEEDED: 'Azure API rate limit exceeded. Please reduce request frequency.',
  TRANSIENT_SERVICE_ERROR: 'Azure API is temporarily unavailable.',
  CLIENT_ERROR: 'Azure API rejected the request.',
  NOT_FOUND: 'The requested Azure resource was not found.',
  VALIDATION_ERROR: 'Input validation failed.',
  UNKNOWN_ERROR: 'An unexpected error occurred',
};

export function exitCodeFor(kind: ErrorKind): number {
  return KIND_TO_EXIT[kind];
}

/** Read a numeric HTTP status off our own or an SDK error. */
export function statusCodeOf(err: unknown): number | undefined {
  if (err instanceof ServiceHttpError) return err.statusCode;
  if (typeof err === 'object' && err !== null && 'statusCode' in err) {
    const status = err.statusCode;
    if (typeof status === 'number') return status;
  }
  return undefined;
}

// ---- Classification ----------------------------------------------------

export type FailureClass = 'authentication' | 'rate_limit' | 'server' | 'client' | 'network' | 'unknown';

const AUTH_ERROR_NAMES = new Set([
  'ServiceAuthenticationError',
  'AuthenticationError',
  'AuthenticationRequiredError',
  'CredentialUnavailableError',
  'ClientAuthenticationError',
]);

const NETWORK_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
  'REQUEST_SEND_ERROR',
]);

function errorCodeOf(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err) {
    const code = err.code;
    if (typeof code === 'string') return code;
  }
  return undefined;
}

/**
 * Classify a collaborator failure.  Checked in priority order:
 * authentication, HTTP status, network; anything else is unknown.
 */
export function classifyFailure(err: unknown): FailureClass {
  if (err instanceof ServiceAuthenticationError) return 'authentication';
  if (err instanceof Error && AUTH_ERROR_NAMES.has(err.name)) return 'authentication';

  const status = statusCodeOf(err);
  if (status !== undefined) {
    if (status === 429) return 'rate_limit';
    if (status >= 500 && status < 600) return 'server';
    if (status >= 400 && status < 500) return 'client';
  }

  if (err instanceof ServiceNetworkError) return 'network';
  const code = errorCodeOf(err);
  if (code !== undefined && NETWORK_ERROR_CODES.has(code)) return 'network';

  return 'unknown';
}

function kindOf(err: unknown): ErrorKind {
  if (err instanceof AuthenticationExpiredError) return 'AUTHENTICATION_EXPIRED';
  if (err instanceof RateLimitExceededError) return 'RATE_LIMIT_EXCEEDED';
  if (err instanceof ValidationError || err instanceof ZodError) return 'VALIDATION_ERROR';

  switch (classifyFailure(err)) {
    case 'authentication':
      return 'AUTHENTICATION_EXPIRED';
    case 'rate_limit':
      return 'RATE_LIMIT_EXCEEDED';
    case 'server':
    case 'network':
      return 'TRANSIENT_SERVICE_ERROR';
    case 'client':
      return statusCodeOf(err) === 404 ? 'NOT_FOUND' : 'CLIENT_ERROR';
    case 'unknown':
      return 'UNKNOWN_ERROR';
  }
}

/**
 * Convert an unknown thrown value into a FailureEnvelope.
 */
export function toFailureEnvelope(err: unknown): FailureEnvelope {
  const kind = kindOf(err);
  const details = err instanceof Error ? err.message : String(err);
  const status = statusCodeOf(err);
  const message = kind === 'CLIENT_ERROR' && status !== undefined
    ? `Azure API Error (${status})`
    : MESSAGES[kind];

  return {
    error_kind: kind,
    message,
    details: redactString(details),
    remediation: [...REMEDIATION[kind]],
    retryable: RETRYABLE.has(kind),
  };
}

export type Outcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: FailureEnvelope };

/**
 * Run a core operation and fold any failure into the envelope.  Never throws.
 */
export async function runOperation<T>(fn: () => T | Promise<T>): Promise<Outcome<T>> {
  try {
    return { ok: true, value: await fn() };
  } catch (err) {
    return { ok: false, error: toFailureEnvelope(err) };
  }
}
