/**
 * Runner infrastructure, shared by every core operation and CLI command.
 *
 * Re-exports the building blocks: structured logging, error taxonomy and
 * failure envelopes, redaction, retry policies, run context and fan-out.
 */

// Logger
export {
  createLogger,
  LOG_LEVELS,
  type StructuredLogger,
  type LoggerOptions,
  type LogEntry,
  type LogLevel,
  type LogBindings,
} from './logger.js';

// Errors
export {
  ServiceAuthenticationError,
  ServiceHttpError,
  ServiceNetworkError,
  AuthenticationExpiredError,
  RateLimitExceededError,
  ValidationError,
  fromZodError,
  formatZodIssues,
  classifyFailure,
  statusCodeOf,
  toFailureEnvelope,
  runOperation,
  exitCodeFor,
  REMEDIATION,
  EXIT_SUCCESS,
  EXIT_VALIDATION,
  EXIT_DEPENDENCY,
  EXIT_BUG,
  type ErrorKind,
  type FailureClass,
  type FailureEnvelope,
  type Outcome,
} from './errors.js';

// Redaction
export {
  redact,
  redactRecord,
  redactString,
  maskId,
  REDACT_DENYLIST_KEYS,
} from './redact.js';

// Retry
export {
  executeWithRetry,
  parseRetryAfter,
  retryAfterOf,
  sleep,
  DEFAULT_RETRY_POLICY,
  type RetryPolicy,
  type RetryOptions,
  type Sleep,
} from './retry.js';

// Context
export {
  createRunContext,
  DEFAULT_CONCURRENCY,
  type RunContext,
  type RunContextOptions,
} from './context.js';

// Fan-out
export { mapWithConcurrency } from './fanout.js';

// Record parsing
export { parseRecords, type ParseRecordsOptions } from './records.js';
